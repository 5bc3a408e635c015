// Recursive nested arrays of indices: geometry boundaries, semantic values,
// material values and texture values all share this shape.
// Traversals are depth-agnostic; the depth a geometry type expects is checked separately.

import { IdRemapTable } from './id-remap.js';

export type NestedArray<T> =
  | { kind: 'indices'; items: T[] }
  | { kind: 'nested'; children: NestedArray<T>[] };

export type Boundaries = NestedArray<number>;

// Semantic, material and texture values may hold null
export type NullableValues = NestedArray<number | null>;

export function indices<T>(items: T[]): NestedArray<T> {
  return { kind: 'indices', items };
}

export function nested<T>(children: NestedArray<T>[]): NestedArray<T> {
  return { kind: 'nested', children };
}

export function toIndex(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0
    ? value
    : undefined;
}

export function toNullableIndex(value: unknown): number | null | undefined {
  return value === null ? null : toIndex(value);
}

// An array whose first element is an array is nested, anything else is a leaf list.
// Elements that `coerce` rejects are dropped.
export function parseNestedArray<T>(
  value: unknown,
  coerce: (element: unknown) => T | undefined
): NestedArray<T> {
  if (!Array.isArray(value) || value.length === 0) return indices([]);

  if (Array.isArray(value[0])) {
    return nested(value.map((sub) => parseNestedArray(sub, coerce)));
  }

  const items: T[] = [];
  for (const element of value) {
    const parsed = coerce(element);
    if (parsed !== undefined) items.push(parsed);
  }
  return indices(items);
}

export type NestedJson<T> = T[] | NestedJson<T>[];

export function nestedArrayToJson<T>(na: NestedArray<T>): NestedJson<T> {
  if (na.kind === 'indices') return [...na.items];
  return na.children.map((child) => nestedArrayToJson(child));
}

// `position` is the index of the value inside its own leaf list
export function mapLeaves<T, U>(
  na: NestedArray<T>,
  fn: (value: T, position: number) => U
): NestedArray<U> {
  if (na.kind === 'indices') return indices(na.items.map(fn));
  return nested(na.children.map((child) => mapLeaves(child, fn)));
}

export function* leaves<T>(na: NestedArray<T>): Generator<T> {
  if (na.kind === 'indices') {
    yield* na.items;
    return;
  }
  for (const child of na.children) {
    yield* leaves(child);
  }
}

export function* leafLists<T>(na: NestedArray<T>): Generator<T[]> {
  if (na.kind === 'indices') {
    yield na.items;
    return;
  }
  for (const child of na.children) {
    yield* leafLists(child);
  }
}

// Number of nested levels above the leaf lists (a flat list has depth 0)
export function depth<T>(na: NestedArray<T>): number {
  if (na.kind === 'indices' || na.children.length === 0) return 0;
  return 1 + depth(na.children[0]);
}

export function isUniformDepth<T>(na: NestedArray<T>): boolean {
  if (na.kind === 'indices' || na.children.length === 0) return true;
  const expected = depth(na.children[0]);
  return na.children.every(
    (child) => depth(child) === expected && isUniformDepth(child)
  );
}

export function isEmpty<T>(na: NestedArray<T>): boolean {
  return leaves(na).next().done === true;
}

// First-seen wins: a miss records table.size + scopeOffset
export function renumber(
  boundaries: Boundaries,
  table: IdRemapTable,
  scopeOffset = 0
): Boundaries {
  return mapLeaves(boundaries, (index) => table.resolve(index, scopeOffset));
}

export function offsetIndices(boundaries: Boundaries, k: number): Boundaries {
  return mapLeaves(boundaries, (index) => index + k);
}
