// City objects: a typed entity with optional geometries and parent/child links.
// Identity is the key of the map that holds the object.

import type { Extra, GeographicalExtent } from './types.js';
import type { RawCityObject } from './schema.js';
import { MissingReferenceError } from './errors.js';
import { type Geometry, geometryToJson, parseGeometry } from './geometry.js';

export interface CityObject {
  type: string;
  geographicalExtent?: GeographicalExtent;
  attributes?: Record<string, unknown>;
  geometry?: Geometry[];
  children?: string[];
  childrenRoles?: string[];
  parents?: string[];
  other: Extra;
}

export type CityObjects = Map<string, CityObject>;

export function parseCityObject(raw: RawCityObject): CityObject {
  const {
    type,
    geographicalExtent,
    attributes,
    geometry,
    children,
    children_roles: childrenRoles,
    parents,
    ...other
  } = raw;
  return {
    type,
    geographicalExtent,
    attributes,
    geometry: geometry?.map(parseGeometry),
    children,
    childrenRoles,
    parents,
    other,
  };
}

export function parseCityObjects(raw: Record<string, RawCityObject>): CityObjects {
  return new Map(
    Object.entries(raw).map(([id, co]) => [id, parseCityObject(co)])
  );
}

export function cityObjectToJson(co: CityObject): Record<string, unknown> {
  return {
    ...co.other,
    type: co.type,
    geographicalExtent: co.geographicalExtent,
    attributes: co.attributes,
    geometry: co.geometry?.map(geometryToJson),
    children: co.children,
    children_roles: co.childrenRoles,
    parents: co.parents,
  };
}

// Ids become own keys, "__proto__" included
export function cityObjectsToJson(cos: CityObjects): Record<string, unknown> {
  return Object.fromEntries(
    [...cos].map(([id, co]) => [id, cityObjectToJson(co)])
  );
}

export function isTopLevel(co: CityObject): boolean {
  return !co.parents || co.parents.length === 0;
}

export function childIds(co: CityObject): string[] {
  return co.children ? [...co.children] : [];
}

// Extension types start with "+", e.g. "+NoiseBuilding"
export function isExtensionType(co: CityObject): boolean {
  return co.type.startsWith('+');
}

export function extensionTypeName(co: CityObject): string | undefined {
  if (!isExtensionType(co)) return undefined;
  const name = co.type.replace(/^\++/, '');
  const end = name.search(/[+.]/);
  return end === -1 ? name : name.slice(0, end);
}

// Deep copy with every geometry passed through `fn`
export function mapGeometries(
  co: CityObject,
  fn: (g: Geometry) => Geometry
): CityObject {
  const copy = structuredClone(co);
  copy.geometry = co.geometry?.map(fn);
  return copy;
}

export function getCityObject(
  cos: CityObjects,
  id: string,
  referencedBy: string
): CityObject {
  const co = cos.get(id);
  if (!co) {
    throw new MissingReferenceError(`CityObject "${id}"`, referencedBy);
  }
  return co;
}
