/**
 * GoCoordinates Tests
 *
 * Index mapping of the padded board and text parsing helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  columnToIndex,
  formatIntersection,
  fromIndex,
  indexToColumn,
  neighborOffsets,
  parseBoardSize,
  parseColor,
  parseIntersection,
  parseVertex,
  playableIndices,
  sameIntersection,
  stride,
  toIndex,
} from '../src/go/GoCoordinates.js';
import { BOARD_SIZES } from '../src/go/types.js';

describe('GoCoordinates', () => {
  describe('Index Mapping', () => {
    it('should place A1 just above the bottom border row', () => {
      expect(toIndex({ column: 'A', row: 1 }, 9)).toBe(100);
      expect(toIndex({ column: 'A', row: 1 }, 13)).toBe(196);
      expect(toIndex({ column: 'A', row: 1 }, 19)).toBe(400);
    });

    it('should place the highest row in the second array row', () => {
      expect(toIndex({ column: 'A', row: 9 }, 9)).toBe(12);
      expect(toIndex({ column: 'J', row: 9 }, 9)).toBe(20);
    });

    it('should reject points outside the board', () => {
      expect(toIndex({ column: 'K', row: 1 }, 9)).toBeUndefined();
      expect(toIndex({ column: 'A', row: 0 }, 9)).toBeUndefined();
      expect(toIndex({ column: 'A', row: 10 }, 9)).toBeUndefined();
      expect(toIndex({ column: 'T', row: 19 }, 19)).toBe(40);
    });

    it('should map indices back to intersections', () => {
      expect(fromIndex(100, 9)).toEqual({ column: 'A', row: 1 });
      expect(fromIndex(60, 9)).toEqual({ column: 'E', row: 5 });
      expect(fromIndex(400, 19)).toEqual({ column: 'A', row: 1 });
    });

    it('should return undefined for border cells', () => {
      expect(fromIndex(0, 9)).toBeUndefined();
      expect(fromIndex(11, 9)).toBeUndefined();
      expect(fromIndex(21, 9)).toBeUndefined();
      expect(fromIndex(115, 9)).toBeUndefined();
      expect(fromIndex(121, 9)).toBeUndefined();
    });

    it('should round trip every playable index on every board size', () => {
      for (const size of BOARD_SIZES) {
        const indices = playableIndices(size);
        expect(indices).toHaveLength(size * size);
        for (const index of indices) {
          const intersection = fromIndex(index, size);
          expect(intersection).toBeDefined();
          if (intersection) expect(toIndex(intersection, size)).toBe(index);
        }
      }
    });

    it('should list playable indices top row first', () => {
      const indices = playableIndices(9);
      expect(indices).toHaveLength(81);
      expect(indices[0]).toBe(12);
      expect(indices[8]).toBe(20);
      expect(indices[9]).toBe(23);
      expect(indices[80]).toBe(108);
    });

    it('should use the padded stride for vertical neighbors', () => {
      expect(stride(9)).toBe(11);
      expect(neighborOffsets(19)).toEqual([1, -1, 21, -21]);
    });
  });

  describe('Columns', () => {
    it('should skip the letter I', () => {
      expect(columnToIndex('H')).toBe(7);
      expect(columnToIndex('J')).toBe(8);
      expect(indexToColumn(8)).toBe('J');
      expect(indexToColumn(18)).toBe('T');
      expect(indexToColumn(19)).toBeUndefined();
    });
  });

  describe('Parsing', () => {
    it('should parse intersections in either case', () => {
      expect(parseIntersection('Q16')).toEqual({ column: 'Q', row: 16 });
      expect(parseIntersection('q16')).toEqual({ column: 'Q', row: 16 });
      expect(parseIntersection(' d4 ')).toEqual({ column: 'D', row: 4 });
    });

    it('should reject malformed intersections', () => {
      expect(parseIntersection('I5')).toBeUndefined();
      expect(parseIntersection('A0')).toBeUndefined();
      expect(parseIntersection('5A')).toBeUndefined();
      expect(parseIntersection('')).toBeUndefined();
      expect(parseIntersection('pass')).toBeUndefined();
    });

    it('should format intersections', () => {
      expect(formatIntersection({ column: 'K', row: 10 })).toBe('K10');
    });

    it('should parse colors', () => {
      expect(parseColor('b')).toBe('b');
      expect(parseColor('BLACK')).toBe('b');
      expect(parseColor('White')).toBe('w');
      expect(parseColor('x')).toBeUndefined();
    });

    it('should parse vertices including pass', () => {
      expect(parseVertex('PASS')).toBe('pass');
      expect(parseVertex('c3')).toEqual({ column: 'C', row: 3 });
      expect(parseVertex('Z9')).toBeUndefined();
    });

    it('should only accept 9, 13 and 19 as board sizes', () => {
      expect(parseBoardSize(9)).toBe(9);
      expect(parseBoardSize('13')).toBe(13);
      expect(parseBoardSize(' 19 ')).toBe(19);
      expect(parseBoardSize(10)).toBeUndefined();
      expect(parseBoardSize('nineteen')).toBeUndefined();
    });

    it('should compare intersections by value', () => {
      expect(sameIntersection({ column: 'C', row: 3 }, { column: 'C', row: 3 })).toBe(true);
      expect(sameIntersection({ column: 'C', row: 3 }, { column: 'C', row: 4 })).toBe(false);
    });
  });
});
