// A CityJSONFeature: one top-level object and its direct children,
// with their own zero-based vertices and appearance

import type { Extra, Vec3, Vertex } from './types.js';
import { featureSchema, parseWith } from './schema.js';
import { parseJson } from './cityjson.js';
import {
  type Appearance,
  appearanceToJson,
  parseAppearance,
} from './appearance.js';
import {
  type CityObject,
  type CityObjects,
  cityObjectsToJson,
  getCityObject,
  parseCityObjects,
} from './city-object.js';
import {
  type Extensions,
  extensionsToJson,
  parseExtensions,
} from './metadata.js';

export const FEATURE_TYPE = 'CityJSONFeature';

export interface CityJSONFeature {
  type: string;
  id: string;
  cityObjects: CityObjects;
  vertices: Vertex[];
  appearance?: Appearance;
  extensions?: Extensions;
  other: Extra;
}

export function createFeature(id: string): CityJSONFeature {
  return {
    type: FEATURE_TYPE,
    id,
    cityObjects: new Map(),
    vertices: [],
    other: {},
  };
}

export function featureFromJson(json: unknown): CityJSONFeature {
  const { type, id, CityObjects, vertices, appearance, extensions, ...other } =
    parseWith(featureSchema, json, 'CityJSONFeature');
  return {
    type,
    id,
    cityObjects: parseCityObjects(CityObjects),
    vertices,
    appearance: appearance && parseAppearance(appearance),
    extensions: parseExtensions(extensions),
    other,
  };
}

export function parseFeature(text: string, line?: number): CityJSONFeature {
  return featureFromJson(parseJson(text, line));
}

export function featureToJson(f: CityJSONFeature): Record<string, unknown> {
  return {
    ...f.other,
    type: f.type,
    id: f.id,
    CityObjects: cityObjectsToJson(f.cityObjects),
    vertices: f.vertices,
    appearance: f.appearance && appearanceToJson(f.appearance),
    extensions: extensionsToJson(f.extensions),
  };
}

export function stringifyFeature(f: CityJSONFeature): string {
  return JSON.stringify(featureToJson(f));
}

// The object the feature is named after
export function mainCityObject(f: CityJSONFeature): CityObject {
  return getCityObject(f.cityObjects, f.id, `CityJSONFeature "${f.id}"`);
}

// Average of the feature-local vertices; NaN components for a feature without vertices
export function featureCentroid(f: CityJSONFeature): Vec3 {
  const totals: Vec3 = [0, 0, 0];
  for (const v of f.vertices) {
    totals[0] += v[0];
    totals[1] += v[1];
    totals[2] += v[2];
  }
  const n = f.vertices.length;
  return [totals[0] / n, totals[1] / n, totals[2] / n];
}
