/**
 * GoSearch - Monte Carlo Tree Search
 *
 * Each iteration selects a leaf by UCT, expands it with the candidate
 * points, plays a heuristic playout from one of the new children and
 * backpropagates the final area estimate.
 *
 * Nodes live in an arena and refer to each other by handle. Playout plies
 * become nodes too, and positions already in the arena are linked rather
 * than duplicated, so the graph can contain cycles. Selection guards
 * against those with the current path; backpropagation follows parent
 * handles, which always point to an older node.
 */

import type { GoBoard } from './GoBoard.js';
import { expansionCandidates, playoutMove } from './GoPlayout.js';
import { computeZobristHash } from './GoZobrist.js';
import {
  COLOR_NAMES,
  Color,
  DEFAULT_SEARCH_CONFIG,
  Move,
  NodeHandle,
  SearchConfig,
  SearchNode,
  SearchResult,
  oppositeColor,
} from './types.js';

// =============================================================================
// Scoring Helpers
// =============================================================================

/**
 * UCT priority of a child. Unvisited children come first.
 */
export function uctScore(
  wins: number,
  visits: number,
  parentVisits: number,
  explorationConstant: number
): number {
  if (visits === 0) return Infinity;
  const exploitation = wins / visits;
  const exploration = explorationConstant * Math.sqrt(Math.log(Math.max(1, parentVisits)) / visits);
  return exploitation + exploration;
}

/** Whether an area estimate is a win for `color` */
export function isWinFor(color: Color, score: number): boolean {
  return color === 'b' ? score > 0 : score < 0;
}

/**
 * Resign when late enough in the game and the estimate is worse for
 * `color` than the threshold
 */
export function shouldResign(
  board: GoBoard,
  color: Color,
  config: Pick<SearchConfig, 'resignAfterMove' | 'resignThreshold'>
): boolean {
  if (board.moveNumber <= config.resignAfterMove) return false;
  const score = board.estimateScore();
  const deficit = color === 'b' ? -score : score;
  return deficit > config.resignThreshold;
}

// =============================================================================
// Search
// =============================================================================

interface SimulationOutcome {
  handle: NodeHandle;
  score: number;
}

export class GoSearch {
  private config: SearchConfig;
  private nodes: SearchNode[] = [];
  private byHash: Map<bigint, NodeHandle[]> = new Map();

  constructor(config: Partial<SearchConfig> = {}) {
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
  }

  /** Nodes in the arena of the last search */
  get nodeCount(): number {
    return this.nodes.length;
  }

  getNode(handle: NodeHandle): SearchNode | undefined {
    return this.nodes[handle];
  }

  /**
   * Search for a move for `color` on a copy of `board`. The arena is
   * rebuilt on every call.
   */
  search(board: GoBoard, color: Color): SearchResult {
    const startTime = Date.now();
    this.nodes = [];
    this.byHash = new Map();

    const rootBoard = board.clone();
    rootBoard.setToMove(color);

    if (shouldResign(rootBoard, color, this.config)) {
      if (this.config.verbose) {
        console.error(`[GoSearch] ${COLOR_NAMES[color]} resigns at move ${rootBoard.moveNumber}`);
      }
      return {
        move: { type: 'resign' },
        resigned: true,
        visits: 0,
        winRate: 0,
        nodes: 0,
        iterations: 0,
        elapsedMs: Date.now() - startTime,
      };
    }

    const root = this.createNode(rootBoard, null, oppositeColor(color), null);

    let iterations = 0;
    for (; iterations < this.config.iterations; iterations++) {
      const leaf = this.select(root);
      this.expand(leaf);
      const start = this.simulationStart(leaf);
      const outcome = this.simulate(start);
      this.backpropagate(outcome.handle, outcome.score);
    }

    const best = this.bestChild(root);
    const result: SearchResult = best
      ? {
          move: best.move ?? { type: 'pass' },
          resigned: false,
          visits: best.visits,
          winRate: best.visits > 0 ? best.wins / best.visits : 0,
          nodes: this.nodes.length,
          iterations,
          elapsedMs: Date.now() - startTime,
        }
      : {
          move: { type: 'pass' },
          resigned: false,
          visits: 0,
          winRate: 0,
          nodes: this.nodes.length,
          iterations,
          elapsedMs: Date.now() - startTime,
        };

    if (this.config.verbose) {
      console.error(
        `[GoSearch] ${COLOR_NAMES[color]}: ${describeMove(result.move)} ` +
        `visits=${result.visits} winRate=${result.winRate.toFixed(3)} ` +
        `nodes=${result.nodes} time=${result.elapsedMs}ms`
      );
    }

    return result;
  }

  // ===========================================================================
  // Arena
  // ===========================================================================

  private createNode(
    board: GoBoard,
    parent: NodeHandle | null,
    playedLastMove: Color,
    move: Move | null,
    hash: bigint = computeZobristHash(board)
  ): NodeHandle {
    const handle = this.nodes.length;
    this.nodes.push({
      handle,
      parent,
      children: [],
      board,
      playedLastMove,
      move,
      visits: 0,
      wins: 0,
      hash,
      terminal: false,
      score: null,
    });

    const bucket = this.byHash.get(hash);
    if (bucket) bucket.push(handle);
    else this.byHash.set(hash, [handle]);
    return handle;
  }

  /** A node already holding this position, if any */
  private findExisting(board: GoBoard, playedLastMove: Color, hash: bigint): NodeHandle | undefined {
    const bucket = this.byHash.get(hash);
    return bucket?.find(handle => {
      const node = this.nodes[handle];
      return node.playedLastMove === playedLastMove && node.board.samePosition(board);
    });
  }

  /**
   * Attach the position reached by `move` under `parent`, reusing an
   * existing node for the same position
   */
  private linkChild(parent: NodeHandle, board: GoBoard, playedLastMove: Color, move: Move): NodeHandle {
    const parentNode = this.nodes[parent];
    const hash = computeZobristHash(board);
    const existing = this.findExisting(board, playedLastMove, hash);

    if (existing !== undefined) {
      if (existing !== parent && !parentNode.children.includes(existing)) {
        parentNode.children.push(existing);
      }
      return existing;
    }

    const child = this.createNode(board, parent, playedLastMove, move, hash);
    parentNode.children.push(child);
    return child;
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private select(root: NodeHandle): NodeHandle {
    const path = new Set<NodeHandle>([root]);
    let current = root;

    for (;;) {
      const node = this.nodes[current];
      if (node.terminal || node.children.length === 0) return current;

      const next = this.bestUctChild(node, path);
      if (next === undefined) return current;
      path.add(next);
      current = next;
    }
  }

  private bestUctChild(node: SearchNode, exclude?: Set<NodeHandle>): NodeHandle | undefined {
    let best: NodeHandle | undefined;
    let bestScore = -Infinity;

    for (const handle of node.children) {
      if (exclude?.has(handle)) continue;
      const child = this.nodes[handle];
      const score = uctScore(child.wins, child.visits, node.visits, this.config.explorationConstant);
      if (best === undefined || score > bestScore) {
        best = handle;
        bestScore = score;
      }
    }
    return best;
  }

  /**
   * Add the candidate moves of a leaf as children. Finished games and
   * positions the side to move would resign stay leaves.
   */
  private expand(handle: NodeHandle): void {
    const node = this.nodes[handle];
    const color = oppositeColor(node.playedLastMove);
    if (node.board.isGameOver() || shouldResign(node.board, color, this.config)) return;

    for (const index of expansionCandidates(node.board, this.config.random)) {
      const board = node.board.clone();
      if (!board.playAt(index, color).ok) continue;
      const move = board.lastMove;
      if (move) this.linkChild(handle, board, color, move);
    }
  }

  private simulationStart(handle: NodeHandle): NodeHandle {
    const node = this.nodes[handle];
    const unvisited = node.children.find(child => this.nodes[child].visits === 0);
    if (unvisited !== undefined) return unvisited;
    return this.bestUctChild(node) ?? handle;
  }

  /**
   * Play heuristic moves from `start` until the game ends, a side would
   * resign, or the ply cap is reached. Every ply is linked into the arena.
   */
  private simulate(start: NodeHandle): SimulationOutcome {
    let current = start;
    const board = this.nodes[start].board.clone();

    for (let ply = 0; ply < this.config.maxPlayoutPlies; ply++) {
      if (board.isGameOver()) break;

      const color = oppositeColor(this.nodes[current].playedLastMove);
      if (shouldResign(board, color, this.config)) break;

      const move = playoutMove(board, color, this.config.random);
      if (!board.play(move)) {
        throw new Error(`Playout produced an illegal move: ${describeMove(move)}`);
      }
      current = this.linkChild(current, board.clone(), color, move);
    }

    const score = board.estimateScore();
    const endNode = this.nodes[current];
    endNode.terminal = true;
    endNode.score = score;
    return { handle: current, score };
  }

  private backpropagate(from: NodeHandle, score: number): void {
    let handle: NodeHandle | null = from;
    while (handle !== null) {
      const node: SearchNode = this.nodes[handle];
      node.visits++;
      if (isWinFor(node.playedLastMove, score)) node.wins++;
      handle = node.parent;
    }
  }

  /**
   * Most visited root child; the first one wins ties. A linked child whose
   * stored move does not lead from the root to its position is skipped.
   */
  private bestChild(root: NodeHandle): SearchNode | undefined {
    const rootNode = this.nodes[root];
    let best: SearchNode | undefined;
    for (const handle of rootNode.children) {
      const child = this.nodes[handle];
      if (child.parent !== root && !this.reachesFrom(rootNode, child)) continue;
      if (!best || child.visits > best.visits) best = child;
    }
    return best;
  }

  private reachesFrom(from: SearchNode, to: SearchNode): boolean {
    if (!to.move) return false;
    const board = from.board.clone();
    return board.play(to.move) && board.samePosition(to.board);
  }
}

function describeMove(move: Move): string {
  switch (move.type) {
    case 'pass':
      return 'pass';
    case 'resign':
      return 'resign';
    case 'place':
      return `${move.intersection.column}${move.intersection.row}`;
  }
}

/**
 * Generate a move for `color` with a fresh search
 */
export function generateMove(
  board: GoBoard,
  color: Color,
  iterations: number,
  config: Partial<SearchConfig> = {}
): Move {
  return new GoSearch({ ...config, iterations }).search(board, color).move;
}

export function createGoSearch(config?: Partial<SearchConfig>): GoSearch {
  return new GoSearch(config);
}
