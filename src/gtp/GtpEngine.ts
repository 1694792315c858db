/**
 * GtpEngine - Go Text Protocol front end
 *
 * Parses GTP command lines, drives a GoBoard and the Monte Carlo search,
 * and formats `=` / `?` responses. Diagnostics go to stderr so stdout only
 * ever carries protocol responses.
 *
 * @module gtp/GtpEngine
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { GoBoard } from '../go/GoBoard.js';
import {
  formatIntersection,
  parseBoardSize,
  parseColor,
  parseVertex,
} from '../go/GoCoordinates.js';
import { formatScore } from '../go/GoScoring.js';
import { GoSearch } from '../go/GoSearch.js';
import { BoardSize, DEFAULT_KOMI, SearchConfig } from '../go/types.js';

export const ENGINE_NAME = 'goban-mcts';
export const ENGINE_VERSION = '0.1.0';

export const KNOWN_COMMANDS = [
  'protocol_version',
  'name',
  'version',
  'known_command',
  'list_commands',
  'quit',
  'boardsize',
  'clear_board',
  'komi',
  'play',
  'genmove',
  'showboard',
  'final_score',
] as const;

export type GtpCommand = (typeof KNOWN_COMMANDS)[number];

export interface GtpResponse {
  id: number | null;
  success: boolean;
  message: string;
  /** Set by `quit`; the caller should stop reading */
  quit: boolean;
}

export interface GtpEngineOptions {
  size?: BoardSize;
  komi?: number;
  search?: Partial<SearchConfig>;
}

type CommandResult = { success: boolean; message: string; quit?: boolean };

const ok = (message = ''): CommandResult => ({ success: true, message });
const fail = (message: string): CommandResult => ({ success: false, message });

function isKnownCommand(name: string): name is GtpCommand {
  return KNOWN_COMMANDS.some(command => command === name);
}

/**
 * `=` or `?`, the id if one was given, then the message. Multi-line
 * messages start on the next line.
 */
export function formatResponse(response: GtpResponse): string {
  const head = `${response.success ? '=' : '?'}${response.id ?? ''}`;
  if (response.message === '') return head;
  if (response.message.startsWith('\n')) return `${head}${response.message}`;
  return `${head} ${response.message}`;
}

/**
 * Strip comments and control characters, collapse tabs
 * @returns undefined for lines that carry no command
 */
function preprocess(line: string): string | undefined {
  const cleaned = line
    .replace(/#.*$/, '')
    .replace(/\t/g, ' ')
    .replace(/[\x00-\x08\x0b-\x1f\x7f]/g, '')
    .trim();
  return cleaned === '' ? undefined : cleaned;
}

export class GtpEngine {
  private board: GoBoard;
  private search: Partial<SearchConfig>;

  constructor(options: GtpEngineOptions = {}) {
    this.board = new GoBoard(options.size ?? 19);
    this.board.setKomi(options.komi ?? DEFAULT_KOMI);
    this.search = options.search ?? {};
  }

  /** Copy of the current board */
  getBoard(): GoBoard {
    return this.board.clone();
  }

  /**
   * Run one command line
   * @returns undefined for blank and comment-only lines
   */
  execute(line: string): GtpResponse | undefined {
    const cleaned = preprocess(line);
    if (cleaned === undefined) return undefined;

    const match = /^(\d+)\s+(.*)$/.exec(cleaned);
    const id = match ? parseInt(match[1], 10) : null;
    const [name = '', ...args] = (match ? match[2] : cleaned).split(/\s+/);

    if (this.search.verbose) {
      console.error(`[GTP] <- ${cleaned}`);
    }

    const result = this.dispatch(name.toLowerCase(), args);
    return { id, success: result.success, message: result.message, quit: result.quit ?? false };
  }

  /** Run one command line and format the reply; '' for lines with no command */
  handle(line: string): string {
    const response = this.execute(line);
    return response ? formatResponse(response) : '';
  }

  private dispatch(name: string, args: string[]): CommandResult {
    if (!isKnownCommand(name)) return fail('unknown command');

    switch (name) {
      case 'protocol_version':
        return ok('2');
      case 'name':
        return ok(ENGINE_NAME);
      case 'version':
        return ok(ENGINE_VERSION);
      case 'known_command':
        return ok(args[0] !== undefined && isKnownCommand(args[0]) ? 'true' : 'false');
      case 'list_commands':
        return ok(KNOWN_COMMANDS.join('\n'));
      case 'quit':
        return { success: true, message: '', quit: true };
      case 'boardsize':
        return this.boardsize(args);
      case 'clear_board':
        this.board.clear();
        return ok();
      case 'komi':
        return this.komi(args);
      case 'play':
        return this.play(args);
      case 'genmove':
        return this.genmove(args);
      case 'showboard':
        return ok(`\n${this.board.render()}`);
      case 'final_score':
        return ok(formatScore(this.board.estimateScore()));
    }
  }

  private boardsize(args: string[]): CommandResult {
    if (args[0] === undefined) return fail('syntax error');
    const size = parseBoardSize(args[0]);
    if (size === undefined) return fail('unacceptable size');

    const komi = this.board.komi;
    this.board = new GoBoard(size);
    this.board.setKomi(komi);
    return ok();
  }

  private komi(args: string[]): CommandResult {
    const value = Number(args[0]);
    if (args[0] === undefined || !Number.isFinite(value)) return fail('syntax error');
    this.board.setKomi(value);
    return ok();
  }

  private play(args: string[]): CommandResult {
    if (args.length < 2) return fail('syntax error');

    const color = parseColor(args[0]);
    if (!color) return fail('invalid color');

    const vertex = parseVertex(args[1]);
    if (!vertex) return fail('invalid vertex');

    if (vertex === 'pass') {
      this.board.setToMove(color);
      this.board.play({ type: 'pass' });
      return ok();
    }

    const result = this.board.tryPlay({ type: 'place', intersection: vertex, color });
    return result.ok ? ok() : fail('illegal move');
  }

  private genmove(args: string[]): CommandResult {
    const color = args[0] === undefined ? undefined : parseColor(args[0]);
    if (!color) return fail('invalid color');

    const result = new GoSearch(this.search).search(this.board, color);
    const move = result.move;

    switch (move.type) {
      case 'resign':
        return ok('resign');
      case 'pass':
        this.board.setToMove(color);
        this.board.play(move);
        return ok('pass');
      case 'place': {
        const played = this.board.tryPlay(move);
        if (!played.ok) {
          throw new Error(`Search chose an illegal move ${formatIntersection(move.intersection)}: ${played.reason}`);
        }
        return ok(formatIntersection(move.intersection));
      }
    }
  }
}

// =============================================================================
// Stateless Replay
// =============================================================================

export const ReplayRequestSchema = z.object({
  boardSize: z.number().int(),
  moveList: z.array(z.string()),
  nextCommand: z.string(),
});

export type ReplayRequest = z.infer<typeof ReplayRequestSchema>;

/**
 * Build a fresh engine, replay `play <move>` for each entry of the move
 * list, then answer `nextCommand`
 */
export function replayCommands(request: unknown, options: GtpEngineOptions = {}): string {
  const parsed = ReplayRequestSchema.safeParse(request);
  if (!parsed.success) {
    return `? invalid request: ${parsed.error.issues[0]?.message ?? 'unknown error'}`;
  }

  const { boardSize, moveList, nextCommand } = parsed.data;
  if (parseBoardSize(boardSize) === undefined) {
    return `Invalid board size ${boardSize} given`;
  }

  const engine = new GtpEngine(options);
  engine.handle(`boardsize ${boardSize}`);
  for (const move of moveList) {
    engine.handle(`play ${move}`);
  }
  return engine.handle(nextCommand);
}

// =============================================================================
// Stream Loop
// =============================================================================

/**
 * Answer GTP commands line by line until `quit` or end of input
 */
export async function serveGtp(
  engine: GtpEngine,
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Promise<void> {
  const rl = createInterface({ input, terminal: false });

  try {
    for await (const line of rl) {
      const response = engine.execute(line);
      if (!response) continue;
      output.write(`${formatResponse(response)}\n\n`);
      if (response.quit) break;
    }
  } finally {
    rl.close();
  }
}
