// collect: CityJSONSeq -> CityJSON.
// Features are folded into the document started from the header line, in arrival order;
// vertices are deduplicated and the transform renormalised once the stream ends.

import type { Transform, Vertex } from './types.js';
import { IdRemapTable } from './id-remap.js';
import { CityJsonError } from './errors.js';
import {
  addMaterial,
  addTexture,
  addTextureVertices,
  createAppearance,
  createAppearanceTables,
} from './appearance.js';
import { mapGeometries } from './city-object.js';
import {
  offsetGeometryVertices,
  renumberGeometryVertices,
  renumberMaterials,
  renumberTextures,
} from './geometry.js';
import { type CityJSON, checkVersion, parseCityJSON } from './cityjson.js';
import { type CityJSONFeature, parseFeature } from './feature.js';

// Re-express a vertex quantized with `source` in the quantization of `target`
export function requantize(v: Vertex, source: Transform, target: Transform): Vertex {
  const out: Vertex = [0, 0, 0];
  for (let i = 0; i < 3; i++) {
    const real = v[i] * source.scale[i] + source.translate[i];
    out[i] = Math.round((real - target.translate[i]) / target.scale[i]);
  }
  return out;
}

export function sameTransform(a: Transform, b: Transform): boolean {
  return [0, 1, 2].every(
    (i) => a.scale[i] === b.scale[i] && a.translate[i] === b.translate[i]
  );
}

/**
 * Accumulates features into one document. The appearance catalog of the document
 * is the state shared across features: each feature's materials and textures are
 * inserted into it (deduplicated) and the feature-local indices are rewritten
 * through tables rebuilt from those insertions.
 */
export class Collector {
  readonly doc: CityJSON;
  private finished = false;

  constructor(header: CityJSON) {
    checkVersion(header);
    this.doc = header;
    this.doc.sortedIds = [];
  }

  get featureCount(): number {
    return this.doc.sortedIds.length;
  }

  add(feature: CityJSONFeature, sourceTransform?: Transform): void {
    if (this.finished) {
      throw new CityJsonError('cannot add features after the collection is finished');
    }
    const tables = createAppearanceTables();

    if (feature.appearance) {
      const target = (this.doc.appearance ??= createAppearance());
      feature.appearance.materials?.forEach((m, i) => {
        tables.materials.set(i, addMaterial(target, structuredClone(m)));
      });
      feature.appearance.textures?.forEach((t, i) => {
        tables.textures.set(i, addTexture(target, structuredClone(t)));
      });
      const uvs = feature.appearance.verticesTexture;
      if (uvs?.length) {
        const offset = addTextureVertices(target, uvs);
        uvs.forEach((_, i) => tables.textureVertices.set(i, offset + i));
      }
    }

    // Feature vertices are dense and zero-based: a shift is enough
    const vertexOffset = this.doc.vertices.length;
    for (const [id, co] of feature.cityObjects) {
      this.doc.cityObjects.set(
        id,
        mapGeometries(co, (g) =>
          renumberTextures(
            renumberMaterials(offsetGeometryVertices(g, vertexOffset), tables.materials),
            tables.textures,
            tables.textureVertices
          )
        )
      );
    }

    const correct =
      sourceTransform && !sameTransform(sourceTransform, this.doc.transform)
        ? sourceTransform
        : undefined;
    for (const v of feature.vertices) {
      this.doc.vertices.push(
        correct ? requantize(v, correct, this.doc.transform) : [v[0], v[1], v[2]]
      );
    }

    this.doc.sortedIds.push(feature.id);
  }

  finish(): CityJSON {
    if (!this.finished) {
      removeDuplicateVertices(this.doc);
      updateTransform(this.doc);
      this.finished = true;
    }
    return this.doc;
  }
}

// First occurrence of each exact integer triple wins; boundaries are renumbered
export function removeDuplicateVertices(doc: CityJSON): void {
  const seen = new Map<string, number>();
  const table = new IdRemapTable();
  const unique: Vertex[] = [];

  doc.vertices.forEach((v, i) => {
    const key = `${v[0]} ${v[1]} ${v[2]}`;
    let newId = seen.get(key);
    if (newId === undefined) {
      newId = unique.length;
      seen.set(key, newId);
      unique.push(v);
    }
    table.set(i, newId);
  });

  for (const [id, co] of doc.cityObjects) {
    doc.cityObjects.set(
      id,
      mapGeometries(co, (g) => renumberGeometryVertices(g, table))
    );
  }
  doc.vertices = unique;
}

// Move the per-axis minimum into translate so vertices start at 0
export function updateTransform(doc: CityJSON): void {
  if (doc.vertices.length === 0) return;

  const mins: Vertex = [Infinity, Infinity, Infinity];
  for (const v of doc.vertices) {
    for (let i = 0; i < 3; i++) {
      if (v[i] < mins[i]) mins[i] = v[i];
    }
  }

  doc.vertices = doc.vertices.map((v): Vertex => [
    v[0] - mins[0],
    v[1] - mins[1],
    v[2] - mins[2],
  ]);
  const { scale, translate } = doc.transform;
  doc.transform = {
    scale,
    translate: [
      mins[0] * scale[0] + translate[0],
      mins[1] * scale[1] + translate[1],
      mins[2] * scale[2] + translate[2],
    ],
  };
}

export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * Collect one or more CityJSONSeq streams. The first stream's header is the target
 * document; every further stream's header only supplies the transform its features
 * are re-quantized from. Any malformed line aborts the whole collection.
 */
export async function collect(sources: LineSource[]): Promise<CityJSON> {
  let collector: Collector | undefined;

  for (const [s, source] of sources.entries()) {
    let sourceTransform: Transform | undefined;
    let lineNumber = 0;

    for await (const line of source) {
      lineNumber++;
      if (lineNumber === 1) {
        const header = parseCityJSON(line, lineNumber);
        if (collector) {
          checkVersion(header);
          sourceTransform = header.transform;
        } else {
          collector = new Collector(header);
        }
        continue;
      }
      if (!collector) throw new CityJsonError('missing header line');
      collector.add(parseFeature(line, lineNumber), sourceTransform);
    }

    if (lineNumber === 0) {
      throw new CityJsonError(`input ${s + 1} is empty: no header line`);
    }
  }

  if (!collector) {
    throw new CityJsonError('no input to collect');
  }
  return collector.finish();
}
