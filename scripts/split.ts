// cat: CityJSON -> CityJSONSeq.
// A metadata header followed by one feature per top-level city object,
// each renumbered into its own zero-based vertex and appearance space.

import type { SortingStrategy, Vertex } from './types.js';
import { IdRemapTable } from './id-remap.js';
import { MissingReferenceError } from './errors.js';
import {
  type AppearanceTables,
  createAppearanceTables,
  isAppearanceEmpty,
  sliceAppearance,
} from './appearance.js';
import {
  type CityObject,
  childIds,
  getCityObject,
  mapGeometries,
} from './city-object.js';
import {
  renumberGeometryVertices,
  renumberMaterials,
  renumberTextures,
} from './geometry.js';
import { type CityJSON, checkVersion, sortFeatureIds } from './cityjson.js';
import { type CityJSONFeature, createFeature } from './feature.js';

export interface CatResult {
  header: CityJSON;
  features: Generator<CityJSONFeature>;
}

// Vertices first, then materials, then textures with their uv indices
function renumberCityObject(
  co: CityObject,
  vertices: IdRemapTable,
  appearance: AppearanceTables
): CityObject {
  return mapGeometries(co, (g) =>
    renumberTextures(
      renumberMaterials(renumberGeometryVertices(g, vertices, 0), appearance.materials),
      appearance.textures,
      appearance.textureVertices
    )
  );
}

/**
 * First line of the sequence: the document without objects or vertices.
 * Templates keep only the appearance entries they use, renumbered.
 */
export function metadataHeader(doc: CityJSON): CityJSON {
  const header: CityJSON = {
    ...structuredClone({ ...doc, cityObjects: new Map(), vertices: [] }),
    appearance: undefined,
    sortedIds: [],
  };
  if (!doc.appearance) return header;

  const tables = createAppearanceTables();
  if (header.geometryTemplates) {
    header.geometryTemplates.templates = header.geometryTemplates.templates.map((g) =>
      renumberTextures(
        renumberMaterials(g, tables.materials),
        tables.textures,
        tables.textureVertices
      )
    );
  }
  const appearance = sliceAppearance(doc.appearance, tables);
  if (
    !isAppearanceEmpty(appearance) ||
    appearance.defaultThemeMaterial !== undefined ||
    appearance.defaultThemeTexture !== undefined
  ) {
    header.appearance = appearance;
  }
  return header;
}

export function featureAt(doc: CityJSON, i: number): CityJSONFeature | undefined {
  const id = doc.sortedIds[i];
  if (id === undefined) return undefined;
  const co = getCityObject(doc.cityObjects, id, 'feature order');

  const vertexTable = new IdRemapTable();
  const tables = createAppearanceTables();
  const feature = createFeature(id);

  feature.cityObjects.set(id, renumberCityObject(co, vertexTable, tables));

  // Only direct children are carried; grandchildren are not walked
  for (const childId of childIds(co)) {
    const child = getCityObject(doc.cityObjects, childId, `CityObject "${id}"`);
    feature.cityObjects.set(childId, renumberCityObject(child, vertexTable, tables));
  }

  const vertices = new Array<Vertex>(vertexTable.size);
  for (const [oldId, newId] of vertexTable.entries()) {
    const v = doc.vertices[oldId];
    if (v === undefined) {
      throw new MissingReferenceError(`vertex ${oldId}`, `CityObject "${id}"`);
    }
    vertices[newId] = [v[0], v[1], v[2]];
  }
  feature.vertices = vertices;

  if (doc.appearance) {
    const appearance = sliceAppearance(doc.appearance, tables);
    if (!isAppearanceEmpty(appearance)) feature.appearance = appearance;
  }
  return feature;
}

export function* features(doc: CityJSON): Generator<CityJSONFeature> {
  for (let i = 0; i < doc.sortedIds.length; i++) {
    const feature = featureAt(doc, i);
    if (feature) yield feature;
  }
}

export function cat(doc: CityJSON, order: SortingStrategy = 'insertion'): CatResult {
  checkVersion(doc);
  sortFeatureIds(doc, order);
  return { header: metadataHeader(doc), features: features(doc) };
}
