import { describe, it, expect } from 'vitest';
import {
  Collector,
  collect,
  removeDuplicateVertices,
  requantize,
  sameTransform,
  updateTransform,
} from '../merge.js';
import { cat } from '../split.js';
import { type CityJSON, createCityJSON, stringifyCityJSON } from '../cityjson.js';
import { parseCityObject } from '../city-object.js';
import { parseFeature, stringifyFeature } from '../feature.js';
import { leaves, nestedArrayToJson } from '../nested-array.js';
import { type Transform, toRealWorld } from '../types.js';
import { CityJsonError, JsonParseError } from '../errors.js';
import {
  loadSmallCity,
  loadTemplateCity,
  materialNames,
  realBoundaries,
  textureRings,
} from './helpers.js';

function seq(doc: CityJSON): string[] {
  const { header, features } = cat(doc);
  return [stringifyCityJSON(header), ...[...features].map(stringifyFeature)];
}

function headerLine(scale: number, translate: [number, number, number]): string {
  return JSON.stringify({
    type: 'CityJSON',
    version: '2.0',
    transform: { scale: [scale, scale, scale], translate },
    CityObjects: {},
    vertices: [],
  });
}

function pointFeature(id: string, vertices: number[][]): string {
  return JSON.stringify({
    type: 'CityJSONFeature',
    id,
    CityObjects: {
      [id]: {
        type: 'Building',
        geometry: [{ type: 'MultiPoint', boundaries: vertices.map((_, i) => i) }],
      },
    },
    vertices,
  });
}

describe('merge.ts functionality', () => {
  describe('round trip', () => {
    it('should reproduce every object from its features', async () => {
      const original = loadSmallCity();
      const collected = await collect([seq(loadSmallCity())]);

      expect([...collected.cityObjects.keys()]).toEqual(['b1', 'b1-part', 'r1']);
      for (const [id, co] of original.cityObjects) {
        const copy = collected.cityObjects.get(id);
        expect(copy?.type).toBe(co.type);
        expect(copy?.attributes).toEqual(co.attributes);
        const geometries = co.geometry ?? [];
        const copies = copy?.geometry ?? [];
        expect(copies).toHaveLength(geometries.length);
        geometries.forEach((g, i) => {
          const c = copies[i];
          if (!c) return;
          expect(realBoundaries(c, collected.vertices, collected.transform)).toEqual(
            realBoundaries(g, original.vertices, original.transform)
          );
          expect(materialNames(c, 'summer', collected.appearance)).toEqual(
            materialNames(g, 'summer', original.appearance)
          );
          expect(textureRings(c, 'winter', collected.appearance)).toEqual(
            textureRings(g, 'winter', original.appearance)
          );
        });
      }
    });

    it('should offset geometry instances past earlier features', async () => {
      const collected = await collect([seq(loadTemplateCity())]);
      const instance = collected.cityObjects.get('t1')?.geometry?.[0];
      expect(instance && nestedArrayToJson(instance.boundaries)).toEqual([3]);
      expect(instance?.transformationMatrix).toHaveLength(16);
      expect(collected.vertices[3]).toEqual([500, 600, 700]);
      expect(collected.appearance?.materials?.map((m) => m.name)).toEqual(['c']);
      expect(collected.geometryTemplates?.templates[0]?.material?.leaves).toEqual({
        value: 0,
        other: {},
      });
    });

    it('should keep header members', async () => {
      const collected = await collect([seq(loadSmallCity())]);
      expect(collected.metadata?.title).toBe('small test city');
      expect(collected.other).toEqual({ '+note': 'kept' });
      expect(collected.sortedIds).toEqual(['b1', 'r1']);
    });

    it('should deduplicate materials and textures across features', async () => {
      const collected = await collect([seq(loadSmallCity())]);
      expect(collected.appearance?.materials?.map((m) => m.name)).toEqual(['glass', 'brick']);
      expect(collected.appearance?.textures?.map((t) => t.image)).toEqual([
        'facade.png',
        'asphalt.jpg',
      ]);
      expect(collected.appearance?.verticesTexture).toHaveLength(6);
    });

    it('should only reference existing vertices', async () => {
      const collected = await collect([seq(loadSmallCity())]);
      for (const co of collected.cityObjects.values()) {
        for (const g of co.geometry ?? []) {
          for (const i of leaves(g.boundaries)) {
            expect(i).toBeLessThan(collected.vertices.length);
          }
        }
      }
    });
  });

  describe('several inputs', () => {
    it('should requantize features of an input with another transform', async () => {
      const doc = await collect([
        [headerLine(0.01, [1000, 2000, 0]), pointFeature('a', [[0, 0, 0], [100, 0, 0], [0, 100, 0]])],
        [headerLine(0.001, [1000, 2000, 0]), pointFeature('b', [[1000, 0, 0], [2000, 0, 0]])],
      ]);
      expect(doc.vertices).toEqual([
        [0, 0, 0],
        [100, 0, 0],
        [0, 100, 0],
        [200, 0, 0],
      ]);
      const b = doc.cityObjects.get('b')?.geometry?.[0];
      expect(b && nestedArrayToJson(b.boundaries)).toEqual([1, 3]);
      expect(doc.sortedIds).toEqual(['a', 'b']);
    });

    it('should reject an empty input', async () => {
      await expect(collect([[headerLine(1, [0, 0, 0])], []])).rejects.toThrow(
        'CityJSON error: input 2 is empty: no header line'
      );
    });

    it('should reject no input', async () => {
      await expect(collect([])).rejects.toThrow('CityJSON error: no input to collect');
    });

    it('should abort on a malformed feature line', async () => {
      await expect(collect([[headerLine(1, [0, 0, 0]), '{not json']])).rejects.toThrow(
        JsonParseError
      );
    });

    it('should accept async sources', async () => {
      async function* lines() {
        yield headerLine(1, [0, 0, 0]);
        yield pointFeature('a', [[1, 2, 3]]);
      }
      const doc = await collect([lines()]);
      expect(doc.vertices).toEqual([[0, 0, 0]]);
      expect(doc.transform.translate).toEqual([1, 2, 3]);
    });
  });

  describe('Collector', () => {
    it('should not take features after finishing', () => {
      const collector = new Collector(createCityJSON());
      collector.add(parseFeature(pointFeature('a', [[0, 0, 0]])));
      collector.finish();
      expect(collector.featureCount).toBe(1);
      expect(() => collector.add(parseFeature(pointFeature('b', [[1, 1, 1]])))).toThrow(
        CityJsonError
      );
    });

    it('should reject an unsupported header', () => {
      const header = createCityJSON();
      header.version = '0.9';
      expect(() => new Collector(header)).toThrow(CityJsonError);
    });
  });

  describe('removeDuplicateVertices', () => {
    function withDuplicates(): CityJSON {
      const doc = createCityJSON();
      doc.vertices = [
        [0, 0, 0],
        [1, 0, 0],
        [0, 0, 0],
        [1, 1, 0],
        [1, 0, 0],
      ];
      doc.cityObjects.set(
        'b1',
        parseCityObject({
          type: 'Building',
          geometry: [{ type: 'MultiSurface', boundaries: [[[0, 1, 3]], [[2, 4, 3]]] }],
        })
      );
      return doc;
    }

    it('should keep the first of each vertex', () => {
      const doc = withDuplicates();
      removeDuplicateVertices(doc);
      expect(doc.vertices).toEqual([
        [0, 0, 0],
        [1, 0, 0],
        [1, 1, 0],
      ]);
      const g = doc.cityObjects.get('b1')?.geometry?.[0];
      expect(g && nestedArrayToJson(g.boundaries)).toEqual([[[0, 1, 2]], [[0, 1, 2]]]);
    });

    it('should be idempotent', () => {
      const once = withDuplicates();
      removeDuplicateVertices(once);
      const twice = withDuplicates();
      removeDuplicateVertices(twice);
      removeDuplicateVertices(twice);
      expect(twice.vertices).toEqual(once.vertices);
      expect(twice.cityObjects).toEqual(once.cityObjects);
    });
  });

  describe('updateTransform', () => {
    it('should move the minimum into translate without moving any point', () => {
      const doc = createCityJSON();
      doc.transform = { scale: [0.5, 0.5, 0.5], translate: [1, 2, 3] };
      doc.vertices = [
        [10, 20, 30],
        [15, 25, 35],
      ];
      const before = doc.vertices.map((v) => toRealWorld(v, doc.transform));

      updateTransform(doc);

      expect(doc.vertices).toEqual([
        [0, 0, 0],
        [5, 5, 5],
      ]);
      expect(doc.transform.translate).toEqual([6, 12, 18]);
      expect(doc.vertices.map((v) => toRealWorld(v, doc.transform))).toEqual(before);
    });

    it('should leave an empty document alone', () => {
      const doc = createCityJSON();
      doc.transform.translate = [5, 5, 5];
      updateTransform(doc);
      expect(doc.transform.translate).toEqual([5, 5, 5]);
    });
  });

  describe('requantize', () => {
    it('should express a vertex in another transform', () => {
      expect(
        requantize(
          [1000, 0, 0],
          { scale: [0.001, 0.001, 0.001], translate: [1000, 2000, 0] },
          { scale: [0.01, 0.01, 0.01], translate: [1000, 2000, 0] }
        )
      ).toEqual([100, 0, 0]);
    });

    it('should compare transforms', () => {
      const a: Transform = { scale: [1, 1, 1], translate: [0, 0, 0] };
      expect(sameTransform(a, structuredClone(a))).toBe(true);
      expect(sameTransform(a, { ...a, translate: [0, 0, 1] })).toBe(false);
    });
  });
});
