// Type definitions shared across CityJSON / CityJSONSeq processing

// Basic coordinate types
export type Vec2 = [number, number];
export type Vec3 = [number, number, number];

// Vertices are integers, only meaningful relative to the transform of their document
export type Vertex = Vec3;

// Members we don't model are kept as-is and written back unchanged
export type Extra = Record<string, unknown>;

// real = vertex * scale + translate
export interface Transform {
  scale: Vec3;
  translate: Vec3;
}

// [minx, miny, minz, maxx, maxy, maxz]
export type GeographicalExtent = [number, number, number, number, number, number];

// Ordering of the features written by cat
export type SortingStrategy = 'insertion' | 'alphabetical' | 'morton' | 'hilbert';

export const SORTING_STRATEGIES: readonly SortingStrategy[] = [
  'insertion',
  'alphabetical',
  'morton',
  'hilbert',
];

export function isSortingStrategy(value: string): value is SortingStrategy {
  return SORTING_STRATEGIES.some((s) => s === value);
}

export function identityTransform(): Transform {
  return { scale: [1, 1, 1], translate: [0, 0, 0] };
}

export function toRealWorld(v: Vec3, transform: Transform): Vec3 {
  return [
    v[0] * transform.scale[0] + transform.translate[0],
    v[1] * transform.scale[1] + transform.translate[1],
    v[2] * transform.scale[2] + transform.translate[2],
  ];
}
