/**
 * GoPlayout - Candidate generation and the playout move policy
 *
 * Both work on padded-board indices. Expansion tries a small fixed set of
 * points; playouts follow a short priority list of tactical rules before
 * falling back to a random open point.
 */

import type { GoBoard } from './GoBoard.js';
import { fromIndex, playableIndices, toIndex } from './GoCoordinates.js';
import { getBookMove, starPoints } from './GoOpenings.js';
import { randomElement, randomInt } from './GoRandom.js';
import { Color, Move, oppositeColor } from './types.js';

const PASS: Move = { type: 'pass' };

function placeMove(board: GoBoard, index: number, color: Color): Move {
  const intersection = fromIndex(index, board.size);
  if (!intersection) throw new Error(`Index ${index} is not on the board`);
  return { type: 'place', intersection, color };
}

/**
 * A random empty point that is not the ko point
 */
export function randomEmptyPoint(board: GoBoard, random: () => number): number | undefined {
  const empties = playableIndices(board.size).filter(
    index => board.cellAt(index) === 'empty' && index !== board.ko
  );
  return randomElement(random, empties);
}

/**
 * A random empty point where `color` may legally play, excluding the ko
 * point and points whose four sides are all one color
 */
export function randomOpenPoint(
  board: GoBoard,
  color: Color,
  random: () => number
): number | undefined {
  const open = playableIndices(board.size).filter(
    index =>
      board.cellAt(index) === 'empty' &&
      index !== board.ko &&
      board.diamondAt(index) === undefined
  );

  while (open.length > 0) {
    const pick = randomInt(random, open.length);
    const index = open[pick];
    if (board.isLegalAt(index, color)) return index;
    open[pick] = open[open.length - 1];
    open.pop();
  }
  return undefined;
}

/**
 * Points worth trying when a node is expanded: the star points, the
 * liberties of each color's weakest group and one random empty point.
 * Duplicates are removed; order is kept.
 */
export function expansionCandidates(board: GoBoard, random: () => number): number[] {
  const candidates: number[] = [];
  const seen = new Set<number>();
  const add = (index: number | undefined): void => {
    if (index === undefined || seen.has(index)) return;
    seen.add(index);
    candidates.push(index);
  };

  for (const point of starPoints(board.size)) {
    add(toIndex(point, board.size));
  }
  board.weakestGroup('b').forEach(add);
  board.weakestGroup('w').forEach(add);
  add(randomEmptyPoint(board, random));

  return candidates;
}

function atari(liberties: number[]): number | undefined {
  return liberties.length === 1 ? liberties[0] : undefined;
}

/**
 * Choose the next playout move for `color`, in priority order:
 * book point on an empty 19x19, capture an opponent group in atari,
 * save an own group in atari, play a liberty of whichever weakest group has
 * more liberties, a random open point, pass.
 */
export function playoutMove(board: GoBoard, color: Color, random: () => number): Move {
  const book = getBookMove(board, random);
  if (book) {
    const index = toIndex(book, board.size);
    if (index !== undefined && board.isLegalAt(index, color)) {
      return placeMove(board, index, color);
    }
  }

  const theirs = board.weakestGroup(oppositeColor(color));
  const ours = board.weakestGroup(color);

  const capture = atari(theirs);
  if (capture !== undefined && board.isLegalAt(capture, color)) {
    return placeMove(board, capture, color);
  }

  const escape = atari(ours);
  if (escape !== undefined && board.isLegalAt(escape, color)) {
    return placeMove(board, escape, color);
  }

  const contested = ours.length > theirs.length ? ours : theirs;
  if (contested.length > 0) {
    const legal = contested.filter(
      index => board.diamondAt(index) === undefined && board.isLegalAt(index, color)
    );
    const pick = randomElement(random, legal);
    if (pick !== undefined) return placeMove(board, pick, color);
  }

  const open = randomOpenPoint(board, color, random);
  return open === undefined ? PASS : placeMove(board, open, color);
}
