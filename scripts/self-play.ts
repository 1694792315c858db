#!/usr/bin/env npx tsx
/**
 * Self-Play Script
 *
 * Plays engine-vs-engine Go games and records every position, the move the
 * search chose and the final result as JSONL.
 *
 * Usage:
 *   npx tsx scripts/self-play.ts [options]
 *
 * Options:
 *   --games <n>          Number of games to play (default: 5)
 *   --size <n>           Board size 9, 13 or 19 (default: 9)
 *   --iterations <n>     Search iterations for both sides (default: 100)
 *   --output <file>      Output file (default: self-play.jsonl)
 *   --seed <value>       Seed for reproducible games
 *   --verbose            Show game progress
 */

import * as fs from 'fs';
import * as path from 'path';
import { GoBoard } from '../src/go/GoBoard.js';
import { formatIntersection, parseBoardSize } from '../src/go/GoCoordinates.js';
import { SeededRng } from '../src/go/GoRandom.js';
import { formatScore } from '../src/go/GoScoring.js';
import { GoSearch } from '../src/go/GoSearch.js';
import { BoardSize, COLOR_NAMES, Color, Move, SearchConfig } from '../src/go/types.js';

// =============================================================================
// Types
// =============================================================================

type GameResult = Color | 'draw';

interface RecordedPosition {
  diagram: string[];
  toMove: Color;
  move: string;
  winRate: number;
  visits: number;
  gameResult: GameResult;
  ply: number;
}

interface GameRecord {
  id: string;
  startTime: string;
  endTime: string;
  size: BoardSize;
  result: GameResult;
  termination: 'passes' | 'resignation' | 'move limit';
  score: string;
  moveCount: number;
  moves: string[];
  positions: RecordedPosition[];
}

interface SelfPlayConfig {
  games: number;
  size: BoardSize;
  iterations: number;
  outputFile: string;
  seed: string | undefined;
  maxMoves: number;
  verbose: boolean;
}

interface SelfPlayStats {
  gamesPlayed: number;
  blackWins: number;
  whiteWins: number;
  draws: number;
  resignations: number;
  totalMoves: number;
  startTime: number;
}

// =============================================================================
// Configuration
// =============================================================================

const DEFAULT_CONFIG: SelfPlayConfig = {
  games: 5,
  size: 9,
  iterations: 100,
  outputFile: 'self-play.jsonl',
  seed: undefined,
  maxMoves: 400,
  verbose: false,
};

function describeMove(move: Move): string {
  switch (move.type) {
    case 'pass':
      return 'pass';
    case 'resign':
      return 'resign';
    case 'place':
      return formatIntersection(move.intersection);
  }
}

// =============================================================================
// Self-Play Engine
// =============================================================================

class SelfPlayEngine {
  private config: SelfPlayConfig;
  private search: GoSearch;
  private stats: SelfPlayStats;

  constructor(config: SelfPlayConfig) {
    this.config = config;

    const searchConfig: Partial<SearchConfig> = { iterations: config.iterations };
    if (config.seed !== undefined) {
      searchConfig.random = new SeededRng(config.seed).asSource();
    }
    this.search = new GoSearch(searchConfig);
    this.stats = {
      gamesPlayed: 0,
      blackWins: 0,
      whiteWins: 0,
      draws: 0,
      resignations: 0,
      totalMoves: 0,
      startTime: Date.now(),
    };
  }

  async run(): Promise<void> {
    console.log('Go Self-Play');
    console.log(`  Games: ${this.config.games}`);
    console.log(`  Board: ${this.config.size}x${this.config.size}`);
    console.log(`  Iterations: ${this.config.iterations}`);
    console.log(`  Seed: ${this.config.seed ?? 'none'}`);
    console.log(`  Output: ${this.config.outputFile}`);
    console.log();

    const outputPath = path.resolve(this.config.outputFile);
    const output = fs.createWriteStream(outputPath, { flags: 'a' });

    for (let gameNum = 1; gameNum <= this.config.games; gameNum++) {
      if (this.config.verbose) {
        console.log(`Game ${gameNum}/${this.config.games}`);
      } else {
        process.stdout.write(`\rPlaying game ${gameNum}/${this.config.games}...`);
      }

      const game = this.playGame(gameNum);
      this.record(game);
      output.write(JSON.stringify(game) + '\n');

      if (this.config.verbose) {
        console.log(`  Result: ${game.score} (${game.termination}), ${game.moveCount} moves`);
      }
    }

    await new Promise<void>((resolve, reject) => {
      output.on('error', reject);
      output.end(() => resolve());
    });

    console.log('\n');
    this.printSummary();
  }

  private playGame(gameId: number): GameRecord {
    const board = new GoBoard(this.config.size);
    const startTime = new Date().toISOString();
    const positions: RecordedPosition[] = [];
    const moves: string[] = [];
    let termination: GameRecord['termination'] = 'move limit';
    let resigned: Color | null = null;

    while (moves.length < this.config.maxMoves) {
      if (board.isGameOver()) {
        termination = 'passes';
        break;
      }

      const color = board.toMove;
      const result = this.search.search(board, color);
      const move = describeMove(result.move);

      positions.push({
        diagram: board.toDiagram(),
        toMove: color,
        move,
        winRate: result.winRate,
        visits: result.visits,
        gameResult: 'draw',
        ply: moves.length,
      });
      moves.push(move);

      if (result.move.type === 'resign') {
        resigned = color;
        termination = 'resignation';
        break;
      }

      const played = board.tryPlay(result.move);
      if (!played.ok) {
        throw new Error(`Search chose an illegal move ${move}: ${played.reason}`);
      }

      if (this.config.verbose && moves.length % 20 === 0) {
        console.log(`  ${moves.length}. ${COLOR_NAMES[color]} ${move} (win rate ${result.winRate.toFixed(2)})`);
      }
    }

    const score = board.estimateScore();
    let result: GameResult;
    if (resigned) result = resigned === 'b' ? 'w' : 'b';
    else if (score > 0) result = 'b';
    else if (score < 0) result = 'w';
    else result = 'draw';

    for (const position of positions) {
      position.gameResult = result;
    }

    return {
      id: `game_${gameId}_${Date.now()}`,
      startTime,
      endTime: new Date().toISOString(),
      size: this.config.size,
      result,
      termination,
      score: resigned ? `${resigned === 'b' ? 'W' : 'B'}+R` : formatScore(score),
      moveCount: moves.length,
      moves,
      positions,
    };
  }

  private record(game: GameRecord): void {
    this.stats.gamesPlayed++;
    this.stats.totalMoves += game.moveCount;
    if (game.termination === 'resignation') this.stats.resignations++;
    if (game.result === 'b') this.stats.blackWins++;
    else if (game.result === 'w') this.stats.whiteWins++;
    else this.stats.draws++;
  }

  private printSummary(): void {
    const { gamesPlayed } = this.stats;
    const elapsed = (Date.now() - this.stats.startTime) / 1000;
    const pct = (n: number) => (gamesPlayed > 0 ? (n / gamesPlayed * 100).toFixed(1) : '0.0');

    console.log('Self-Play Summary');
    console.log(`Games played:      ${gamesPlayed}`);
    console.log(`Black wins:        ${this.stats.blackWins} (${pct(this.stats.blackWins)}%)`);
    console.log(`White wins:        ${this.stats.whiteWins} (${pct(this.stats.whiteWins)}%)`);
    console.log(`Draws:             ${this.stats.draws} (${pct(this.stats.draws)}%)`);
    console.log(`Resignations:      ${this.stats.resignations}`);
    console.log(`Avg game length:   ${(this.stats.totalMoves / Math.max(1, gamesPlayed)).toFixed(1)} moves`);
    console.log(`Total time:        ${elapsed.toFixed(1)}s`);
    console.log(`Records:           ${this.config.outputFile}`);
  }
}

// =============================================================================
// CLI
// =============================================================================

function parsePositiveInt(flag: string, value: string | undefined): number {
  const n = parseInt(value ?? '', 10);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return n;
}

function parseArgs(): SelfPlayConfig {
  const config = { ...DEFAULT_CONFIG };
  const args = process.argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--games':
        config.games = parsePositiveInt('--games', args[++i]);
        break;
      case '--size': {
        const size = parseBoardSize(args[++i] ?? '');
        if (size === undefined) throw new Error('--size must be 9, 13 or 19');
        config.size = size;
        break;
      }
      case '--iterations':
        config.iterations = parsePositiveInt('--iterations', args[++i]);
        break;
      case '--max-moves':
        config.maxMoves = parsePositiveInt('--max-moves', args[++i]);
        break;
      case '--output':
        config.outputFile = args[++i] ?? config.outputFile;
        break;
      case '--seed':
        config.seed = args[++i];
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
    }
  }

  return config;
}

function printHelp(): void {
  console.log(`
Go Self-Play

Usage: npx tsx scripts/self-play.ts [options]

Options:
  --games <n>        Number of games to play (default: 5)
  --size <n>         Board size 9, 13 or 19 (default: 9)
  --iterations <n>   Search iterations per move (default: 100)
  --max-moves <n>    Stop a game after this many moves (default: 400)
  --output <file>    JSONL output file (default: self-play.jsonl)
  --seed <value>     Seed the search for reproducible games
  --verbose, -v      Show game progress
  --help, -h         Show this help message

Each line of the output is one game record with its moves, the result and
every position as a diagram with the move chosen there.

Examples:
  npx tsx scripts/self-play.ts --games 3 --size 9 --verbose
  npx tsx scripts/self-play.ts --games 20 --iterations 400 --seed test-seed
`);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const config = parseArgs();
  const engine = new SelfPlayEngine(config);
  await engine.run();
}

main().catch(error => {
  console.error('[self-play] Error during self-play:', error);
  process.exit(1);
});
