/**
 * Go Module
 *
 * Board rules engine and Monte Carlo move search:
 * - Padded-array board with capture, ko and suicide rules
 * - Area score estimate
 * - UCT tree search with heuristic playouts
 *
 * @module go
 */

// Board Engine
export {
  GoBoard,
  createBoard,
} from './GoBoard.js';
export type { DiagramOptions, GoBoardSnapshot } from './GoBoard.js';

// Coordinates
export {
  stride,
  neighborOffsets,
  toIndex,
  fromIndex,
  playableIndices,
  formatIntersection,
  parseIntersection,
  parseColor,
  parseVertex,
  parseBoardSize,
  sameIntersection,
} from './GoCoordinates.js';

// Scoring
export {
  estimateScore,
  scoreBreakdown,
  formatResult,
  formatScore,
} from './GoScoring.js';
export type { ScoreBreakdown } from './GoScoring.js';

// Search
export {
  GoSearch,
  createGoSearch,
  generateMove,
  shouldResign,
  uctScore,
  isWinFor,
} from './GoSearch.js';

// Playout heuristics
export {
  expansionCandidates,
  playoutMove,
  randomOpenPoint,
} from './GoPlayout.js';

// Opening Book
export { starPoints, getBookMove, getBookPoints } from './GoOpenings.js';
export type { BookPoint } from './GoOpenings.js';

// Zobrist Hashing
export { computeZobristHash } from './GoZobrist.js';

export { SeededRng } from './GoRandom.js';

// Types
export type {
  Color,
  BoardSize,
  ColumnLetter,
  IntersectionState,
  Intersection,
  PassMove,
  PlaceMove,
  ResignMove,
  Move,
  PlayFailure,
  PlayResult,
  Group,
  Captures,
  NodeHandle,
  SearchNode,
  SearchResult,
  SearchConfig,
  Difficulty,
} from './types.js';

// Constants
export {
  BOARD_SIZES,
  COLUMNS,
  DEFAULT_KOMI,
  STONE_GLYPHS,
  EMPTY_GLYPH,
  COLOR_NAMES,
  DEFAULT_SEARCH_CONFIG,
  DIFFICULTY_ITERATIONS,
  oppositeColor,
} from './types.js';
