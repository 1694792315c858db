/**
 * GoOpenings - Star points and the empty-board opening book
 *
 * The book only applies to an empty 19x19 board. Candidates carry weights
 * and one is drawn at random so self-play games do not all start alike.
 */

import type { GoBoard } from './GoBoard.js';
import { parseIntersection } from './GoCoordinates.js';
import { randomInt } from './GoRandom.js';
import { BoardSize, Intersection } from './types.js';

/** Weighted opening point */
export interface BookPoint {
  point: string;
  weight: number;
}

const STAR_POINTS: Record<BoardSize, string[]> = {
  9: ['C3', 'G3', 'E5', 'C7', 'G7'],
  13: ['D4', 'K4', 'G7', 'D10', 'K10'],
  19: ['D4', 'K4', 'Q4', 'D10', 'K10', 'Q10', 'D16', 'K16', 'Q16'],
};

const OPENING_BOOK: BookPoint[] = [
  // 4-4
  { point: 'D4', weight: 100 },
  { point: 'Q4', weight: 100 },
  { point: 'D16', weight: 100 },
  { point: 'Q16', weight: 100 },
  // 3-4
  { point: 'C4', weight: 60 },
  { point: 'D3', weight: 60 },
  { point: 'Q3', weight: 60 },
  { point: 'R4', weight: 60 },
  { point: 'C16', weight: 60 },
  { point: 'D17', weight: 60 },
  { point: 'Q17', weight: 60 },
  { point: 'R16', weight: 60 },
  // Tengen
  { point: 'K10', weight: 20 },
];

function toIntersections(points: string[]): Intersection[] {
  const result: Intersection[] = [];
  for (const point of points) {
    const intersection = parseIntersection(point);
    if (!intersection) throw new Error(`Bad book point: ${point}`);
    result.push(intersection);
  }
  return result;
}

/** Fixed strategic points for a board size */
export function starPoints(size: BoardSize): Intersection[] {
  return toIntersections(STAR_POINTS[size]);
}

export function getBookPoints(): readonly BookPoint[] {
  return OPENING_BOOK;
}

/**
 * Weighted draw from the book
 * @returns undefined unless the board is an empty 19x19
 */
export function getBookMove(board: GoBoard, random: () => number): Intersection | undefined {
  if (board.size !== 19 || !board.isEmptyBoard()) return undefined;

  const total = OPENING_BOOK.reduce((sum, entry) => sum + entry.weight, 0);
  let roll = randomInt(random, total);

  for (const entry of OPENING_BOOK) {
    roll -= entry.weight;
    if (roll < 0) return parseIntersection(entry.point);
  }
  return undefined;
}
