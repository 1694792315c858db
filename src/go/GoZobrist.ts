/**
 * GoZobrist - 64-bit Zobrist hashing of Go positions
 *
 * Hashes stones, the ko point and the side to move. Used as the lookup key
 * when the search reuses nodes for positions it has already seen.
 *
 * @module go/GoZobrist
 */

import type { GoBoard } from './GoBoard.js';
import type { Color } from './types.js';

/** Largest padded board is 21 x 21 */
const MAX_CELLS = 21 * 21;

/** Zobrist key tables */
export interface ZobristKeys {
  /** Stone keys: [colorIndex][cellIndex] */
  stones: bigint[][];
  /** Ko point keys: [cellIndex] */
  ko: bigint[];
  /** XOR'd in when White is to move */
  whiteToMove: bigint;
}

const COLOR_INDEX: Record<Color, number> = {
  b: 0,
  w: 1,
};

/**
 * xorshift64* generator with a fixed seed so keys are identical across runs
 */
class PRNG {
  private state: bigint;

  constructor(seed: bigint = 0x9E3779B97F4A7C15n) {
    this.state = seed;
  }

  next(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x ^= (x << 25n) & 0xFFFFFFFFFFFFFFFFn;
    x ^= x >> 27n;
    this.state = x;
    return (x * 0x2545F4914F6CDD1Dn) & 0xFFFFFFFFFFFFFFFFn;
  }
}

function generateZobristKeys(): ZobristKeys {
  const rng = new PRNG();

  const stones: bigint[][] = [[], []];
  for (let color = 0; color < 2; color++) {
    for (let cell = 0; cell < MAX_CELLS; cell++) {
      stones[color][cell] = rng.next();
    }
  }

  const ko: bigint[] = [];
  for (let cell = 0; cell < MAX_CELLS; cell++) {
    ko.push(rng.next());
  }

  return { stones, ko, whiteToMove: rng.next() };
}

const ZOBRIST_KEYS = generateZobristKeys();

/**
 * Compute the hash of a board position from scratch
 * @param toMove - side to move; defaults to the board's own
 */
export function computeZobristHash(board: GoBoard, toMove: Color = board.toMove): bigint {
  let hash = 0n;

  board.forEachStone((index, color) => {
    hash ^= ZOBRIST_KEYS.stones[COLOR_INDEX[color]][index];
  });

  if (board.ko !== null) {
    hash ^= ZOBRIST_KEYS.ko[board.ko];
  }

  if (toMove === 'w') {
    hash ^= ZOBRIST_KEYS.whiteToMove;
  }

  return hash;
}

