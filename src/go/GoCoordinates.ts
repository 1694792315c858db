/**
 * GoCoordinates - Intersection <-> board index mapping and text parsing
 *
 * The board is stored as a flat array of (size + 2)² cells with a one-cell
 * offboard ring. Row 1 is the bottom edge, so it lives in the second-to-last
 * array row.
 *
 * @module go/GoCoordinates
 */

import {
  BOARD_SIZES,
  BoardSize,
  COLUMNS,
  Color,
  ColumnLetter,
  Intersection,
} from './types.js';

/** Width of the padded board array */
export function stride(size: BoardSize): number {
  return size + 2;
}

/** Offsets of the four orthogonal neighbors (right, left, down, up) */
export function neighborOffsets(size: BoardSize): [number, number, number, number] {
  const s = stride(size);
  return [1, -1, s, -s];
}

export function columnToIndex(column: ColumnLetter): number {
  return COLUMNS.indexOf(column);
}

export function indexToColumn(index: number): ColumnLetter | undefined {
  return COLUMNS[index];
}

/**
 * Convert an intersection to its padded-board index
 * @returns undefined when either coordinate falls outside [1, size]
 */
export function toIndex(intersection: Intersection, size: BoardSize): number | undefined {
  const col = columnToIndex(intersection.column);
  const { row } = intersection;
  if (col < 0 || col >= size) return undefined;
  if (!Number.isInteger(row) || row < 1 || row > size) return undefined;

  const s = stride(size);
  return (s - row - 1) * s + col + 1;
}

/**
 * Convert a padded-board index back to an intersection
 * @returns undefined for border cells and out-of-range indices
 */
export function fromIndex(index: number, size: BoardSize): Intersection | undefined {
  const s = stride(size);
  if (!Number.isInteger(index) || index < 0 || index >= s * s) return undefined;

  const col = index % s;
  const arrayRow = Math.floor(index / s);
  if (col === 0 || col === s - 1 || arrayRow === 0 || arrayRow === s - 1) {
    return undefined;
  }

  const column = indexToColumn(col - 1);
  if (!column) return undefined;
  return { column, row: s - arrayRow - 1 };
}

/** Every playable index of a board, in array order (top-left first) */
export function playableIndices(size: BoardSize): number[] {
  const s = stride(size);
  const indices: number[] = [];
  for (let r = 1; r <= size; r++) {
    for (let c = 1; c <= size; c++) {
      indices.push(r * s + c);
    }
  }
  return indices;
}

// =============================================================================
// Text Parsing
// =============================================================================

/** Format an intersection as text, e.g. "Q16" */
export function formatIntersection(intersection: Intersection): string {
  return `${intersection.column}${intersection.row}`;
}

/**
 * Parse "Q16" / "q16". Only the format is checked here; the row is not
 * range-checked against any board size.
 */
export function parseIntersection(text: string): Intersection | undefined {
  const match = /^([a-hj-tA-HJ-T])(\d+)$/.exec(text.trim());
  if (!match) return undefined;

  const column = COLUMNS.find(c => c === match[1].toUpperCase());
  const row = parseInt(match[2], 10);
  if (!column || row < 1) return undefined;
  return { column, row };
}

/** Parse "b", "black", "w", "white" (any case) */
export function parseColor(text: string): Color | undefined {
  switch (text.trim().toLowerCase()) {
    case 'b':
    case 'black':
      return 'b';
    case 'w':
    case 'white':
      return 'w';
    default:
      return undefined;
  }
}

/** Parse a GTP vertex: an intersection or "pass" */
export function parseVertex(text: string): Intersection | 'pass' | undefined {
  if (text.trim().toLowerCase() === 'pass') return 'pass';
  return parseIntersection(text);
}

export function parseBoardSize(value: number | string): BoardSize | undefined {
  const n = typeof value === 'number' ? value : Number(value.trim());
  return BOARD_SIZES.find(size => size === n);
}

export function sameIntersection(a: Intersection, b: Intersection): boolean {
  return a.column === b.column && a.row === b.row;
}
