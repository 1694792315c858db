/**
 * Go Module Type Definitions
 *
 * Board, move and search types shared by the board engine, the Monte Carlo
 * search and the protocol adapters.
 */

import type { GoBoard } from './GoBoard.js';

// =============================================================================
// Core Go Types
// =============================================================================

/** Stone colors */
export type Color = 'b' | 'w';

/** Supported board sizes */
export type BoardSize = 9 | 13 | 19;

/** Column letters (A-T, no I) */
export type ColumnLetter =
  | 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'J' | 'K'
  | 'L' | 'M' | 'N' | 'O' | 'P' | 'Q' | 'R' | 'S' | 'T';

/**
 * State of a single cell of the padded board array.
 * 'offboard' only ever appears on the sentinel border ring.
 */
export type IntersectionState = Color | 'empty' | 'offboard';

/** A playable point, e.g. { column: 'Q', row: 16 } */
export interface Intersection {
  column: ColumnLetter;
  /** 1-based, counted from the bottom edge */
  row: number;
}

// =============================================================================
// Move Representation
// =============================================================================

export interface PassMove {
  type: 'pass';
}

export interface PlaceMove {
  type: 'place';
  intersection: Intersection;
  color: Color;
}

export interface ResignMove {
  type: 'resign';
}

export type Move = PassMove | PlaceMove | ResignMove;

/** Why a move was refused */
export type PlayFailure = 'out_of_bounds' | 'occupied' | 'ko' | 'suicide' | 'resign';

/** Outcome of GoBoard.tryPlay */
export type PlayResult =
  | { ok: true; captured: number }
  | { ok: false; reason: PlayFailure };

/** Stones and liberties of a connected group, as padded-board indices */
export interface Group {
  color: Color;
  stones: number[];
  liberties: number[];
}

/** Capture counts, keyed by the capturing color */
export type Captures = Record<Color, number>;

// =============================================================================
// Search Types
// =============================================================================

/** Opaque handle into the search arena */
export type NodeHandle = number;

/** One position in the Monte Carlo tree */
export interface SearchNode {
  handle: NodeHandle;
  /** Parent handle; null for the root */
  parent: NodeHandle | null;
  children: NodeHandle[];
  /** Position at this node; owned by the node */
  board: GoBoard;
  /** Color whose move produced this position */
  playedLastMove: Color;
  /** Move that produced this position; null for the root */
  move: Move | null;
  visits: number;
  wins: number;
  /** Zobrist key of (stones, ko, side to move) */
  hash: bigint;
  /** Set once a simulation has ended on this node */
  terminal: boolean;
  /** Area estimate recorded when a simulation ended here */
  score: number | null;
}

/** Search statistics returned with the chosen move */
export interface SearchResult {
  /** Chosen move */
  move: Move;
  /** True when the root position was resigned without searching */
  resigned: boolean;
  /** Visits of the chosen root child (0 for pass/resign) */
  visits: number;
  /** Wins / visits of the chosen root child */
  winRate: number;
  /** Nodes created in the arena */
  nodes: number;
  /** Completed iterations */
  iterations: number;
  /** Wall-clock time in ms */
  elapsedMs: number;
}

/** Monte Carlo search configuration */
export interface SearchConfig {
  /** Selection / expansion / simulation / backpropagation rounds */
  iterations: number;
  /** UCT exploration constant */
  explorationConstant: number;
  /** Score deficit that triggers resignation */
  resignThreshold: number;
  /** Resignation is only considered after this move number */
  resignAfterMove: number;
  /** Playout ply cap */
  maxPlayoutPlies: number;
  /** Random source in [0, 1) */
  random: () => number;
  /** Log a search summary to stderr */
  verbose: boolean;
}

/** Named strength presets */
export type Difficulty = 'beginner' | 'intermediate' | 'advanced';

// =============================================================================
// Constants
// =============================================================================

export const BOARD_SIZES: readonly BoardSize[] = [9, 13, 19];

export const COLUMNS: readonly ColumnLetter[] = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'J', 'K',
  'L', 'M', 'N', 'O', 'P', 'Q', 'R', 'S', 'T',
];

export const DEFAULT_KOMI = 6.5;

/** Board glyphs used by render() and diagrams */
export const STONE_GLYPHS: Record<Color, string> = {
  b: 'X',
  w: 'O',
};

export const EMPTY_GLYPH = '.';

export const COLOR_NAMES: Record<Color, string> = {
  b: 'Black',
  w: 'White',
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  iterations: 200,
  explorationConstant: Math.SQRT2,
  resignThreshold: 60,
  resignAfterMove: 100,
  maxPlayoutPlies: 1500,
  random: Math.random,
  verbose: false,
};

export const DIFFICULTY_ITERATIONS: Record<Difficulty, number> = {
  beginner: 25,
  intermediate: 200,
  advanced: 800,
};

/** Returns the other color */
export function oppositeColor(color: Color): Color {
  return color === 'b' ? 'w' : 'b';
}
