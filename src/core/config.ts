/**
 * Engine configuration
 *
 * Environment variables are validated once at startup. Command-line flags
 * override them, and the merged result feeds the search configuration.
 *
 * @module core/config
 */

import { z } from 'zod';
import { parseBoardSize } from '../go/GoCoordinates.js';
import {
  BoardSize,
  Color,
  DEFAULT_KOMI,
  DEFAULT_SEARCH_CONFIG,
  DIFFICULTY_ITERATIONS,
  Difficulty,
  SearchConfig,
} from '../go/types.js';

const BooleanFlagSchema = z
  .enum(['1', '0', 'true', 'false'])
  .transform(value => value === '1' || value === 'true');

export const DifficultySchema = z.enum(['beginner', 'intermediate', 'advanced']);

export const EnvSchema = z.object({
  GO_ENGINE_BOARD_SIZE: z.coerce
    .number()
    .refine(value => parseBoardSize(value) !== undefined, { message: 'must be 9, 13 or 19' })
    .default(19),
  GO_ENGINE_KOMI: z.coerce.number().finite().default(DEFAULT_KOMI),
  GO_ENGINE_ITERATIONS: z.coerce.number().int().positive().optional(),
  GO_ENGINE_DIFFICULTY: DifficultySchema.optional(),
  GO_ENGINE_RESIGN_THRESHOLD: z.coerce.number().nonnegative().default(DEFAULT_SEARCH_CONFIG.resignThreshold),
  GO_ENGINE_VERBOSE: BooleanFlagSchema.default('false'),
});

export interface EngineConfig {
  boardSize: BoardSize;
  komi: number;
  iterations: number;
  resignThreshold: number;
  verbose: boolean;
}

/** Values a command line may override; undefined means "not given" */
export interface ConfigOverrides {
  size?: number;
  komi?: number;
  iterations?: number;
  /** Preset iteration count, ignored when `iterations` is given */
  difficulty?: string;
  resignThreshold?: number;
  verbose?: boolean;
}

/**
 * Read the engine configuration from the environment
 * @throws Error naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const boardSize = parseBoardSize(parsed.data.GO_ENGINE_BOARD_SIZE);
  if (boardSize === undefined) {
    throw new Error(`Invalid configuration: GO_ENGINE_BOARD_SIZE: must be 9, 13 or 19`);
  }

  return {
    boardSize,
    komi: parsed.data.GO_ENGINE_KOMI,
    iterations: resolveIterations(parsed.data.GO_ENGINE_ITERATIONS, parsed.data.GO_ENGINE_DIFFICULTY),
    resignThreshold: parsed.data.GO_ENGINE_RESIGN_THRESHOLD,
    verbose: parsed.data.GO_ENGINE_VERBOSE,
  };
}

function resolveIterations(iterations: number | undefined, difficulty: Difficulty | undefined): number {
  if (iterations !== undefined) return iterations;
  return difficulty ? DIFFICULTY_ITERATIONS[difficulty] : DEFAULT_SEARCH_CONFIG.iterations;
}

/**
 * Apply command-line overrides on top of a loaded configuration
 * @throws Error when an override is out of range
 */
export function applyOverrides(config: EngineConfig, overrides: ConfigOverrides): EngineConfig {
  let boardSize = config.boardSize;
  if (overrides.size !== undefined) {
    const size = parseBoardSize(overrides.size);
    if (size === undefined) throw new Error(`Invalid board size: ${overrides.size}`);
    boardSize = size;
  }

  if (overrides.iterations !== undefined && (!Number.isInteger(overrides.iterations) || overrides.iterations < 1)) {
    throw new Error(`Invalid iteration count: ${overrides.iterations}`);
  }

  let difficulty: Difficulty | undefined;
  if (overrides.difficulty !== undefined) {
    const parsed = DifficultySchema.safeParse(overrides.difficulty.toLowerCase());
    if (!parsed.success) throw new Error(`Invalid difficulty: ${overrides.difficulty}`);
    difficulty = parsed.data;
  }

  return {
    boardSize,
    komi: overrides.komi ?? config.komi,
    iterations:
      overrides.iterations ?? (difficulty ? DIFFICULTY_ITERATIONS[difficulty] : config.iterations),
    resignThreshold: overrides.resignThreshold ?? config.resignThreshold,
    verbose: overrides.verbose ?? config.verbose,
  };
}

/** Search settings implied by an engine configuration */
export function toSearchConfig(config: EngineConfig): Partial<SearchConfig> {
  return {
    iterations: config.iterations,
    resignThreshold: config.resignThreshold,
    verbose: config.verbose,
  };
}

/** Human player's color from a --color flag */
export function parseHumanColor(value: string | undefined): Color {
  return value?.toLowerCase().startsWith('w') ? 'w' : 'b';
}
