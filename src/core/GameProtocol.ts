/**
 * Game session contract
 *
 * What a front end needs from a running game: a state snapshot, the actions
 * open to the side to move, applying one, the result, persistence, and a
 * move suggestion from the engine.
 *
 * @module core/GameProtocol
 */

import type { Difficulty } from '../go/types.js';

/** An action tagged by kind; the payload shape depends on the kind */
export interface GameAction<TKind extends string = string, TPayload = unknown> {
  type: TKind;
  payload: TPayload;
  timestamp?: number;
}

/** Winner of a finished game, 'draw', or null while play continues */
export type GameOutcome<TPlayer extends string> = TPlayer | 'draw' | null;

export interface ActionResult<TPlayer extends string> {
  valid: boolean;
  error?: string;
  /** Stones captured by the action */
  reward?: number;
  gameEnded?: boolean;
  winner?: GameOutcome<TPlayer>;
}

export interface GameMeta<TPlayer extends string> {
  gameType: string;
  /** Moves played so far, passes included */
  turnNumber: number;
  currentPlayer: TPlayer | null;
  isTerminal: boolean;
  winner: GameOutcome<TPlayer>;
  lastUpdate: number;
}

export interface AISuggestion<TAction> {
  action: TAction;
  /** Win rate of the suggested move in [0, 1] */
  evaluation: number;
  explanation: string;
  iterations: number;
  computeTime: number;
}

/** Search budget for a suggestion; `iterations` wins over `difficulty` */
export interface AISuggestionOptions {
  iterations?: number;
  difficulty?: Difficulty;
}

export type StateListener<TState, TPlayer extends string> = (
  state: TState,
  meta: GameMeta<TPlayer>
) => void;

/**
 * @example
 * ```typescript
 * const game: GameProtocol<GoState, GoAction, Color> = new GoProtocol({ size: 9 });
 * game.applyAction({ type: 'place', payload: { column: 'E', row: 5 } });
 * ```
 */
export interface GameProtocol<TState, TAction extends GameAction, TPlayer extends string> {
  readonly gameType: string;

  getState(): TState;
  getMeta(): GameMeta<TPlayer>;
  serialize(): string;
  /** @throws Error when `data` is not a serialized state */
  deserialize(data: string): void;

  getLegalActions(): TAction[];
  isLegalAction(action: TAction): boolean;
  applyAction(action: TAction): ActionResult<TPlayer>;

  isGameOver(): boolean;
  getWinner(): GameOutcome<TPlayer>;
  /** Side to move, null once the game is over */
  getCurrentPlayer(): TPlayer | null;
  reset(): void;

  renderAscii(): string;
  getAISuggestion(options?: AISuggestionOptions): Promise<AISuggestion<TAction>>;

  /** @returns a function that removes the listener */
  onStateChange(listener: StateListener<TState, TPlayer>): () => void;
}

/**
 * Listener bookkeeping for game implementations. Subclasses call
 * `notifyStateChange` after every change to their state.
 */
export abstract class BaseGameProtocol<TState, TAction extends GameAction, TPlayer extends string>
  implements GameProtocol<TState, TAction, TPlayer>
{
  abstract readonly gameType: string;

  private listeners = new Set<StateListener<TState, TPlayer>>();

  abstract getState(): TState;
  abstract getMeta(): GameMeta<TPlayer>;
  abstract serialize(): string;
  abstract deserialize(data: string): void;
  abstract getLegalActions(): TAction[];
  abstract isLegalAction(action: TAction): boolean;
  abstract applyAction(action: TAction): ActionResult<TPlayer>;
  abstract isGameOver(): boolean;
  abstract getWinner(): GameOutcome<TPlayer>;
  abstract getCurrentPlayer(): TPlayer | null;
  abstract reset(): void;
  abstract renderAscii(): string;
  abstract getAISuggestion(options?: AISuggestionOptions): Promise<AISuggestion<TAction>>;

  onStateChange(listener: StateListener<TState, TPlayer>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected notifyStateChange(): void {
    if (this.listeners.size === 0) return;
    const state = this.getState();
    const meta = this.getMeta();
    for (const listener of this.listeners) listener(state, meta);
  }
}
