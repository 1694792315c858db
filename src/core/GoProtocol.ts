/**
 * GoProtocol - GameProtocol implementation for Go
 *
 * Wraps a GoBoard with turn tracking, game-end detection and a Monte Carlo
 * move suggestion. Two consecutive passes end the game and the area
 * estimate decides the winner; a resignation ends it at once.
 *
 * @module core/GoProtocol
 */

import { z } from 'zod';
import {
  ActionResult,
  AISuggestion,
  AISuggestionOptions,
  BaseGameProtocol,
  GameAction,
  GameMeta,
  GameOutcome,
} from './GameProtocol.js';
import { GoBoard } from '../go/GoBoard.js';
import { formatIntersection, playableIndices, fromIndex, toIndex } from '../go/GoCoordinates.js';
import { formatScore } from '../go/GoScoring.js';
import { GoSearch } from '../go/GoSearch.js';
import {
  BoardSize,
  COLOR_NAMES,
  COLUMNS,
  Color,
  ColumnLetter,
  DEFAULT_KOMI,
  DIFFICULTY_ITERATIONS,
  Intersection,
  PlayFailure,
  SearchConfig,
  oppositeColor,
} from '../go/types.js';

// =============================================================================
// Types
// =============================================================================

export type GoWinner = GameOutcome<Color>;

/** Go game state */
export interface GoState {
  size: BoardSize;
  /** Rows of X / O / ., highest row first */
  diagram: string[];
  toMove: Color;
  ko: Intersection | null;
  komi: number;
  captures: Record<Color, number>;
  moveNumber: number;
  consecutivePasses: number;
  resigned: Color | null;
  winner: GoWinner;
  /** Current area estimate, positive favors Black */
  score: number;
}

export type GoAction =
  | GameAction<'place', Intersection>
  | GameAction<'pass', null>
  | GameAction<'resign', null>;

export interface GoProtocolOptions {
  size?: BoardSize;
  komi?: number;
  search?: Partial<SearchConfig>;
}

// =============================================================================
// Serialization Schemas
// =============================================================================

const ColorSchema = z.enum(['b', 'w']);

const ColumnSchema = z.custom<ColumnLetter>(
  value => typeof value === 'string' && COLUMNS.some(column => column === value),
  { message: 'Invalid column letter' }
);

export const IntersectionSchema = z.object({
  column: ColumnSchema,
  row: z.number().int().positive(),
});

export const MoveSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('pass') }),
  z.object({ type: z.literal('resign') }),
  z.object({ type: z.literal('place'), intersection: IntersectionSchema, color: ColorSchema }),
]);

export const GoSnapshotSchema = z.object({
  board: z.object({
    size: z.union([z.literal(9), z.literal(13), z.literal(19)]),
    diagram: z.array(z.string()),
    toMove: ColorSchema,
    ko: IntersectionSchema.nullable(),
    komi: z.number(),
    captures: z.object({ b: z.number().int().nonnegative(), w: z.number().int().nonnegative() }),
    moveNumber: z.number().int().nonnegative(),
    consecutivePasses: z.number().int().nonnegative(),
    lastMove: MoveSchema.nullable(),
  }),
  resigned: ColorSchema.nullable(),
});

export type GoSnapshot = z.infer<typeof GoSnapshotSchema>;

const FAILURE_MESSAGES: Record<PlayFailure, string> = {
  out_of_bounds: 'Invalid move: point is off the board',
  occupied: 'Invalid move: point is occupied',
  ko: 'Invalid move: ko',
  suicide: 'Invalid move: suicide',
  resign: 'Invalid move: resign is not a board move',
};

// =============================================================================
// GoProtocol Implementation
// =============================================================================

export class GoProtocol extends BaseGameProtocol<GoState, GoAction, Color> {
  readonly gameType = 'go';
  readonly displayName = 'Go';
  readonly playerCount = 2;

  private board: GoBoard;
  private resigned: Color | null = null;
  private searchConfig: Partial<SearchConfig>;

  constructor(options: GoProtocolOptions = {}) {
    super();
    this.board = new GoBoard(options.size ?? 19);
    this.board.setKomi(options.komi ?? DEFAULT_KOMI);
    this.searchConfig = options.search ?? {};
  }

  /** Copy of the underlying board */
  getBoard(): GoBoard {
    return this.board.clone();
  }

  // ---------------------------------------------------------------------------
  // State Management
  // ---------------------------------------------------------------------------

  getState(): GoState {
    const snapshot = this.board.toJSON();
    return {
      size: snapshot.size,
      diagram: snapshot.diagram,
      toMove: snapshot.toMove,
      ko: snapshot.ko,
      komi: snapshot.komi,
      captures: snapshot.captures,
      moveNumber: snapshot.moveNumber,
      consecutivePasses: snapshot.consecutivePasses,
      resigned: this.resigned,
      winner: this.getWinner(),
      score: this.board.estimateScore(),
    };
  }

  getMeta(): GameMeta<Color> {
    return {
      gameType: this.gameType,
      turnNumber: this.board.moveNumber,
      currentPlayer: this.getCurrentPlayer(),
      isTerminal: this.isGameOver(),
      winner: this.getWinner(),
      lastUpdate: Date.now(),
    };
  }

  serialize(): string {
    const snapshot: GoSnapshot = {
      board: this.board.toJSON(),
      resigned: this.resigned,
    };
    return JSON.stringify(snapshot);
  }

  deserialize(data: string): void {
    const parsed = GoSnapshotSchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      throw new Error(`Invalid Go state: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }

    const board = GoBoard.fromSnapshot(parsed.data.board);
    if (!board) {
      throw new Error('Invalid Go state: board diagram does not match its size');
    }

    this.board = board;
    this.resigned = parsed.data.resigned;
    this.notifyStateChange();
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  getLegalActions(): GoAction[] {
    if (this.isGameOver()) return [];

    const color = this.board.toMove;
    const timestamp = Date.now();
    const actions: GoAction[] = [];

    for (const index of playableIndices(this.board.size)) {
      if (!this.board.isLegalAt(index, color)) continue;
      const intersection = fromIndex(index, this.board.size);
      if (intersection) actions.push({ type: 'place', payload: intersection, timestamp });
    }

    actions.push({ type: 'pass', payload: null, timestamp });
    actions.push({ type: 'resign', payload: null, timestamp });
    return actions;
  }

  isLegalAction(action: GoAction): boolean {
    if (this.isGameOver()) return false;
    if (action.type !== 'place') return true;

    const index = toIndex(action.payload, this.board.size);
    return index !== undefined && this.board.isLegalAt(index, this.board.toMove);
  }

  applyAction(action: GoAction): ActionResult<Color> {
    if (this.isGameOver()) {
      return { valid: false, error: 'Game is over' };
    }

    const player = this.board.toMove;
    let captured = 0;

    switch (action.type) {
      case 'resign':
        this.resigned = player;
        break;
      case 'pass':
        this.board.play({ type: 'pass' });
        break;
      case 'place': {
        const result = this.board.tryPlay({
          type: 'place',
          intersection: action.payload,
          color: player,
        });
        if (!result.ok) {
          return { valid: false, error: FAILURE_MESSAGES[result.reason] };
        }
        captured = result.captured;
        break;
      }
    }

    this.notifyStateChange();

    const winner = this.getWinner();
    return {
      valid: true,
      reward: captured,
      gameEnded: winner !== null,
      winner,
    };
  }

  // ---------------------------------------------------------------------------
  // Game Flow
  // ---------------------------------------------------------------------------

  isGameOver(): boolean {
    return this.resigned !== null || this.board.isGameOver();
  }

  getWinner(): GoWinner {
    if (this.resigned) return oppositeColor(this.resigned);
    if (!this.board.isGameOver()) return null;

    const score = this.board.estimateScore();
    if (score > 0) return 'b';
    if (score < 0) return 'w';
    return 'draw';
  }

  getCurrentPlayer(): Color | null {
    return this.isGameOver() ? null : this.board.toMove;
  }

  reset(): void {
    this.board.clear();
    this.resigned = null;
    this.notifyStateChange();
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  renderAscii(): string {
    const lines = [this.board.render()];

    const winner = this.getWinner();
    if (this.resigned) {
      lines.push(`${COLOR_NAMES[this.resigned]} resigned`);
    } else if (winner) {
      lines.push(`Result: ${formatScore(this.board.estimateScore())}`);
    } else {
      lines.push(`Turn: ${COLOR_NAMES[this.board.toMove]}`);
    }

    return lines.join('\n');
  }

  // ---------------------------------------------------------------------------
  // AI
  // ---------------------------------------------------------------------------

  async getAISuggestion(options?: AISuggestionOptions): Promise<AISuggestion<GoAction>> {
    if (this.isGameOver()) {
      throw new Error('Game is over');
    }

    const iterations =
      options?.iterations ??
      (options?.difficulty ? DIFFICULTY_ITERATIONS[options.difficulty] : undefined) ??
      this.searchConfig.iterations;

    const search = new GoSearch({ ...this.searchConfig, ...(iterations ? { iterations } : {}) });
    const result = search.search(this.board, this.board.toMove);
    const timestamp = Date.now();

    let action: GoAction;
    let explanation: string;
    switch (result.move.type) {
      case 'place':
        action = { type: 'place', payload: result.move.intersection, timestamp };
        explanation = `${formatIntersection(result.move.intersection)} after ${result.visits} visits`;
        break;
      case 'pass':
        action = { type: 'pass', payload: null, timestamp };
        explanation = 'No candidate move survived expansion';
        break;
      case 'resign':
        action = { type: 'resign', payload: null, timestamp };
        explanation = 'Position is lost';
        break;
    }

    return {
      action,
      evaluation: result.winRate,
      explanation,
      iterations: result.iterations,
      computeTime: result.elapsedMs,
    };
  }
}

// =============================================================================
// Convenience Export
// =============================================================================

export function createGoGame(options?: GoProtocolOptions): GoProtocol {
  return new GoProtocol(options);
}
