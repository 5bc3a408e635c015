import { describe, it, expect } from 'vitest';
import {
  depth,
  indices,
  isEmpty,
  isUniformDepth,
  leafLists,
  leaves,
  mapLeaves,
  nested,
  nestedArrayToJson,
  offsetIndices,
  parseNestedArray,
  renumber,
  toIndex,
  toNullableIndex,
} from '../nested-array.js';
import { IdRemapTable } from '../id-remap.js';

describe('nested-array.ts functionality', () => {
  describe('parseNestedArray', () => {
    it('should parse a flat list', () => {
      expect(parseNestedArray([0, 1, 2], toIndex)).toEqual(indices([0, 1, 2]));
    });

    it('should parse nested lists', () => {
      expect(parseNestedArray([[[0, 1, 2]], [[3]]], toIndex)).toEqual(
        nested([nested([indices([0, 1, 2])]), nested([indices([3])])])
      );
    });

    it('should treat a non-array or empty array as an empty list', () => {
      expect(parseNestedArray('oops', toIndex)).toEqual(indices([]));
      expect(parseNestedArray([], toIndex)).toEqual(indices([]));
    });

    it('should drop elements the coercion rejects', () => {
      expect(parseNestedArray([1, -1, 2.5, 'a', 3], toIndex)).toEqual(indices([1, 3]));
      expect(parseNestedArray([0, null, 2], toNullableIndex)).toEqual(
        indices([0, null, 2])
      );
    });

    it('should write back the same JSON', () => {
      const json = [[[0, 1, 2, 3]], [[4, 5, 6], [7, 8, 9]]];
      expect(nestedArrayToJson(parseNestedArray(json, toIndex))).toEqual(json);
    });
  });

  describe('traversal', () => {
    const solid = parseNestedArray([[[0, 1, 2], [3, 4]], [[5, 6, 7]]], toIndex);

    it('should visit leaves in order', () => {
      expect([...leaves(solid)]).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('should visit leaf lists in order', () => {
      expect([...leafLists(solid)]).toEqual([[0, 1, 2], [3, 4], [5, 6, 7]]);
    });

    it('should report depth', () => {
      expect(depth(indices([1]))).toBe(0);
      expect(depth(solid)).toBe(2);
    });

    it('should detect mixed depths', () => {
      expect(isUniformDepth(solid)).toBe(true);
      expect(isUniformDepth(nested([indices([0]), nested([indices([1])])]))).toBe(false);
      expect(isUniformDepth(nested<number>([]))).toBe(true);
    });

    it('should detect empty arrays', () => {
      expect(isEmpty(nested([indices<number>([]), nested<number>([])]))).toBe(true);
      expect(isEmpty(solid)).toBe(false);
    });

    it('should pass positions within each leaf list', () => {
      const positions = mapLeaves(solid, (_value, position) => position);
      expect(nestedArrayToJson(positions)).toEqual([[[0, 1, 2], [0, 1]], [[0, 1, 2]]]);
    });
  });

  describe('renumber', () => {
    it('should renumber in order of first sight', () => {
      const table = new IdRemapTable();
      const boundaries = parseNestedArray([[10, 20, 30], [30, 20, 40]], toIndex);
      expect(nestedArrayToJson(renumber(boundaries, table))).toEqual([
        [0, 1, 2],
        [2, 1, 3],
      ]);
    });

    it('should share a table across calls', () => {
      const table = new IdRemapTable();
      renumber(indices([5, 6]), table);
      expect(nestedArrayToJson(renumber(indices([6, 7]), table))).toEqual([1, 2]);
    });

    it('should apply the scope offset to new ids', () => {
      const table = new IdRemapTable();
      expect(nestedArrayToJson(renumber(indices([9, 8, 9]), table, 100))).toEqual([
        100, 101, 100,
      ]);
    });

    it('should offset every index', () => {
      const boundaries = parseNestedArray([[0, 1], [2]], toIndex);
      expect(nestedArrayToJson(offsetIndices(boundaries, 5))).toEqual([[5, 6], [7]]);
    });

    it('should not mutate the input', () => {
      const boundaries = indices([3, 4]);
      renumber(boundaries, new IdRemapTable());
      expect(boundaries).toEqual(indices([3, 4]));
    });
  });
});
