// One geometric primitive and the remapping of the indices it carries:
// vertex indices in its boundaries, material indices, texture and uv indices.

import type { Extra } from './types.js';
import type { RawGeometry } from './schema.js';
import { IdRemapTable } from './id-remap.js';
import { InvalidValueError } from './errors.js';
import {
  type Boundaries,
  type NullableValues,
  depth,
  isEmpty,
  isUniformDepth,
  mapLeaves,
  nestedArrayToJson,
  offsetIndices,
  parseNestedArray,
  renumber,
  toIndex,
  toNullableIndex,
} from './nested-array.js';

export const GEOMETRY_TYPES = [
  'MultiPoint',
  'MultiLineString',
  'MultiSurface',
  'CompositeSurface',
  'Solid',
  'MultiSolid',
  'CompositeSolid',
  'GeometryInstance',
] as const;

export type GeometryType = (typeof GEOMETRY_TYPES)[number];

export function isGeometryType(value: string): value is GeometryType {
  return GEOMETRY_TYPES.some((t) => t === value);
}

// Nesting levels above the leaf lists for each geometry type
const BOUNDARY_DEPTHS: Record<GeometryType, number> = {
  MultiPoint: 0,
  MultiLineString: 1,
  MultiSurface: 2,
  CompositeSurface: 2,
  Solid: 3,
  MultiSolid: 4,
  CompositeSolid: 4,
  GeometryInstance: 0,
};

export function boundaryDepth(type: GeometryType): number {
  return BOUNDARY_DEPTHS[type];
}

export interface SemanticSurface {
  type: string;
  parent?: number;
  children?: number[];
  other: Extra;
}

export interface Semantics {
  values: NullableValues;
  surfaces: SemanticSurface[];
  other: Extra;
}

// Either a single value for the whole geometry or one value per surface
export type MaterialReference =
  | { value: number; other: Extra }
  | { values: NullableValues; other: Extra };

// Leaf lists are [textureId, uv, uv, ...]
export interface TextureReference {
  values: NullableValues;
  other: Extra;
}

export interface Geometry {
  type: GeometryType;
  lod?: string | number;
  boundaries: Boundaries;
  semantics?: Semantics;
  material?: Record<string, MaterialReference>;
  texture?: Record<string, TextureReference>;
  template?: number;
  transformationMatrix?: number[];
  other: Extra;
}

function mapRecord<T, U>(
  record: Record<string, T> | undefined,
  fn: (value: T, key: string) => U
): Record<string, U> | undefined {
  if (!record) return undefined;
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, fn(value, key)])
  );
}

export function parseGeometry(raw: RawGeometry): Geometry {
  const {
    type,
    lod,
    boundaries: rawBoundaries,
    semantics: rawSemantics,
    material,
    texture,
    template,
    transformationMatrix,
    ...other
  } = raw;

  if (!isGeometryType(type)) {
    throw new InvalidValueError('geometry.type', `unknown geometry type "${type}"`);
  }

  const boundaries = parseNestedArray(rawBoundaries, toIndex);
  if (!isEmpty(boundaries)) {
    if (!isUniformDepth(boundaries)) {
      throw new InvalidValueError('boundaries', `mixed nesting depth in ${type}`);
    }
    if (depth(boundaries) !== boundaryDepth(type)) {
      throw new InvalidValueError(
        'boundaries',
        `${type} expects nesting depth ${boundaryDepth(type)}, found ${depth(boundaries)}`
      );
    }
  }

  let semantics: Semantics | undefined;
  if (rawSemantics) {
    const { values, surfaces, ...semanticsOther } = rawSemantics;
    semantics = {
      values: parseNestedArray(values, toNullableIndex),
      surfaces: surfaces.map(({ type: surfaceType, parent, children, ...surfaceOther }) => ({
        type: surfaceType,
        parent,
        children,
        other: surfaceOther,
      })),
      other: semanticsOther,
    };
  }

  return {
    type,
    lod,
    boundaries,
    semantics,
    material: mapRecord(material, (reference, theme): MaterialReference => {
      const { value, values, ...referenceOther } = reference;
      if (value !== undefined && values !== undefined) {
        throw new InvalidValueError(
          `material.${theme}`,
          'has both "value" and "values"'
        );
      }
      if (value !== undefined) return { value, other: referenceOther };
      return {
        values: parseNestedArray(values, toNullableIndex),
        other: referenceOther,
      };
    }),
    texture: mapRecord(texture, ({ values, ...referenceOther }) => ({
      values: parseNestedArray(values, toNullableIndex),
      other: referenceOther,
    })),
    template,
    transformationMatrix,
    other,
  };
}

export function geometryToJson(g: Geometry): Record<string, unknown> {
  return {
    ...g.other,
    type: g.type,
    lod: g.lod,
    boundaries: nestedArrayToJson(g.boundaries),
    semantics: g.semantics && {
      ...g.semantics.other,
      values: nestedArrayToJson(g.semantics.values),
      surfaces: g.semantics.surfaces.map((s) => ({
        ...s.other,
        type: s.type,
        parent: s.parent,
        children: s.children,
      })),
    },
    material: mapRecord(g.material, (reference) =>
      'value' in reference
        ? { ...reference.other, value: reference.value }
        : { ...reference.other, values: nestedArrayToJson(reference.values) }
    ),
    texture: mapRecord(g.texture, (reference) => ({
      ...reference.other,
      values: nestedArrayToJson(reference.values),
    })),
    template: g.template,
    transformationMatrix: g.transformationMatrix,
  };
}

export function cloneGeometry(g: Geometry): Geometry {
  return structuredClone(g);
}

// Vertex ids resolved through `table`; misses get table.size + offset
export function renumberGeometryVertices(
  g: Geometry,
  table: IdRemapTable,
  offset = 0
): Geometry {
  return { ...cloneGeometry(g), boundaries: renumber(g.boundaries, table, offset) };
}

export function offsetGeometryVertices(g: Geometry, k: number): Geometry {
  return { ...cloneGeometry(g), boundaries: offsetIndices(g.boundaries, k) };
}

export function renumberMaterials(g: Geometry, table: IdRemapTable): Geometry {
  const copy = cloneGeometry(g);
  copy.material = mapRecord(copy.material, (reference): MaterialReference => {
    if ('value' in reference) {
      return { ...reference, value: table.resolve(reference.value) };
    }
    return {
      ...reference,
      values: mapLeaves(reference.values, (id) =>
        id === null ? null : table.resolve(id)
      ),
    };
  });
  return copy;
}

// Position 0 of each leaf list is a texture id, the rest are uv indices
export function renumberTextures(
  g: Geometry,
  textures: IdRemapTable,
  textureVertices: IdRemapTable,
  uvOffset = 0
): Geometry {
  const copy = cloneGeometry(g);
  copy.texture = mapRecord(copy.texture, (reference) => ({
    ...reference,
    values: mapLeaves(reference.values, (id, position) => {
      if (id === null) return null;
      return position === 0
        ? textures.resolve(id)
        : textureVertices.resolve(id, uvOffset);
    }),
  }));
  return copy;
}
