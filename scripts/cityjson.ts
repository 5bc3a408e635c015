// The monolithic CityJSON document: one global vertex array, one appearance catalog

import type { Extra, SortingStrategy, Transform, Vertex } from './types.js';
import { identityTransform } from './types.js';
import {
  type RawGeometryTemplates,
  cityJSONSchema,
  parseWith,
} from './schema.js';
import { CityJsonError, CjseqError, JsonParseError } from './errors.js';
import {
  type Appearance,
  appearanceToJson,
  parseAppearance,
} from './appearance.js';
import {
  type CityObjects,
  cityObjectsToJson,
  isTopLevel,
  parseCityObjects,
} from './city-object.js';
import { type Geometry, geometryToJson, parseGeometry } from './geometry.js';
import {
  type Extensions,
  type Metadata,
  extensionsToJson,
  metadataToJson,
  parseExtensions,
  parseMetadata,
} from './metadata.js';

export const CITYJSON_TYPE = 'CityJSON';
export const SUPPORTED_VERSIONS = ['1.1', '2.0'];

export interface GeometryTemplates {
  templates: Geometry[];
  // Real coordinates, not transformed
  verticesTemplates: [number, number, number][];
  other: Extra;
}

export interface CityJSON {
  type: string;
  version: string;
  transform: Transform;
  cityObjects: CityObjects;
  vertices: Vertex[];
  metadata?: Metadata;
  appearance?: Appearance;
  geometryTemplates?: GeometryTemplates;
  extensions?: Extensions;
  other: Extra;
  // Top-level ids in feature order; process-local, never written out
  sortedIds: string[];
}

export function createCityJSON(): CityJSON {
  return {
    type: CITYJSON_TYPE,
    version: '2.0',
    transform: identityTransform(),
    cityObjects: new Map(),
    vertices: [],
    other: {},
    sortedIds: [],
  };
}

export function parseJson(text: string, line?: number): unknown {
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new JsonParseError(e instanceof Error ? e.message : String(e), line);
  }
}

function parseGeometryTemplates(
  raw: RawGeometryTemplates
): GeometryTemplates {
  const { templates, 'vertices-templates': verticesTemplates, ...other } = raw;
  return { templates: templates.map(parseGeometry), verticesTemplates, other };
}

export function cityJSONFromJson(json: unknown): CityJSON {
  const {
    type,
    version,
    transform,
    CityObjects,
    vertices,
    metadata,
    appearance,
    'geometry-templates': geometryTemplates,
    extensions,
    ...other
  } = parseWith(cityJSONSchema, json, 'CityJSON document');

  const doc: CityJSON = {
    type,
    version,
    transform,
    cityObjects: parseCityObjects(CityObjects),
    vertices,
    metadata: metadata && parseMetadata(metadata),
    appearance: appearance && parseAppearance(appearance),
    geometryTemplates: geometryTemplates && parseGeometryTemplates(geometryTemplates),
    extensions: parseExtensions(extensions),
    other,
    sortedIds: [],
  };
  sortFeatureIds(doc, 'insertion');
  return doc;
}

export function parseCityJSON(text: string, line?: number): CityJSON {
  return cityJSONFromJson(parseJson(text, line));
}

export function cityJSONToJson(doc: CityJSON): Record<string, unknown> {
  return {
    ...doc.other,
    type: doc.type,
    version: doc.version,
    transform: doc.transform,
    CityObjects: cityObjectsToJson(doc.cityObjects),
    vertices: doc.vertices,
    metadata: doc.metadata && metadataToJson(doc.metadata),
    appearance: doc.appearance && appearanceToJson(doc.appearance),
    'geometry-templates': doc.geometryTemplates && {
      ...doc.geometryTemplates.other,
      templates: doc.geometryTemplates.templates.map(geometryToJson),
      'vertices-templates': doc.geometryTemplates.verticesTemplates,
    },
    extensions: extensionsToJson(doc.extensions),
  };
}

export function stringifyCityJSON(doc: CityJSON): string {
  return JSON.stringify(cityJSONToJson(doc));
}

// Unsupported documents are rejected before anything is written
export function checkVersion(doc: CityJSON): void {
  if (doc.type !== CITYJSON_TYPE) {
    throw new CityJsonError('Input file not CityJSON.');
  }
  if (!SUPPORTED_VERSIONS.includes(doc.version)) {
    throw new CityJsonError(
      `Input file not CityJSON v${SUPPORTED_VERSIONS.join(' nor v')}.`
    );
  }
}

export function topLevelIds(doc: CityJSON): string[] {
  const ids: string[] = [];
  for (const [id, co] of doc.cityObjects) {
    if (isTopLevel(co)) ids.push(id);
  }
  return ids;
}

export function topLevelCount(doc: CityJSON): number {
  return topLevelIds(doc).length;
}

// Recompute the cached feature order
export function sortFeatureIds(doc: CityJSON, order: SortingStrategy): void {
  switch (order) {
    case 'insertion':
      doc.sortedIds = topLevelIds(doc);
      return;
    case 'alphabetical':
      doc.sortedIds = topLevelIds(doc).sort();
      return;
    case 'morton':
    case 'hilbert':
      throw new CjseqError(`Sorting by ${order} order is not implemented`);
  }
}
