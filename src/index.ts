/**
 * goban-mcts - Go rules engine and Monte Carlo move search
 *
 * @module goban-mcts
 */

export * from './go/index.js';

export {
  GoProtocol,
  createGoGame,
  GoSnapshotSchema,
  IntersectionSchema,
  MoveSchema,
} from './core/GoProtocol.js';
export type { GoAction, GoState, GoSnapshot, GoWinner, GoProtocolOptions } from './core/GoProtocol.js';

export { BaseGameProtocol } from './core/GameProtocol.js';
export type {
  GameProtocol,
  GameAction,
  GameMeta,
  GameOutcome,
  ActionResult,
  AISuggestion,
  AISuggestionOptions,
  StateListener,
} from './core/GameProtocol.js';

export {
  loadConfig,
  applyOverrides,
  toSearchConfig,
  parseHumanColor,
  EnvSchema,
  DifficultySchema,
} from './core/config.js';
export type { EngineConfig, ConfigOverrides } from './core/config.js';

export {
  GtpEngine,
  formatResponse,
  replayCommands,
  serveGtp,
  ReplayRequestSchema,
  KNOWN_COMMANDS,
  ENGINE_NAME,
  ENGINE_VERSION,
} from './gtp/GtpEngine.js';
export type { GtpResponse, GtpEngineOptions, GtpCommand, ReplayRequest } from './gtp/GtpEngine.js';
