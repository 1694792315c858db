/**
 * GoScoring - Area score estimate
 *
 * Every stone counts for its color. An empty region counts for a color only
 * when every stone bordering it is of that color; regions touching both
 * colors (or none) count for nobody.
 *
 * @module go/GoScoring
 */

import type { GoBoard } from './GoBoard.js';

/** Per-color totals behind an estimate */
export interface ScoreBreakdown {
  blackStones: number;
  whiteStones: number;
  blackTerritory: number;
  whiteTerritory: number;
  /** Empty points owned by nobody */
  dame: number;
  komi: number;
  /** black - white - komi */
  score: number;
}

export function scoreBreakdown(board: GoBoard): ScoreBreakdown {
  const seen = new Uint8Array(board.cellCount);
  const totals = {
    blackStones: 0,
    whiteStones: 0,
    blackTerritory: 0,
    whiteTerritory: 0,
    dame: 0,
  };

  for (let i = 0; i < board.cellCount; i++) {
    if (seen[i] === 1) continue;
    const state = board.cellAt(i);
    if (state === 'offboard') continue;

    if (state === 'b' || state === 'w') {
      seen[i] = 1;
      if (state === 'b') totals.blackStones++;
      else totals.whiteStones++;
      continue;
    }

    // Breadth-first walk over one empty region
    let regionSize = 0;
    let bordersBlack = false;
    let bordersWhite = false;
    const queue: number[] = [i];
    seen[i] = 1;

    for (let head = 0; head < queue.length; head++) {
      const index = queue[head];
      regionSize++;
      for (const next of board.neighbors(index)) {
        const neighbor = board.cellAt(next);
        if (neighbor === 'b') bordersBlack = true;
        else if (neighbor === 'w') bordersWhite = true;
        else if (neighbor === 'empty' && seen[next] === 0) {
          seen[next] = 1;
          queue.push(next);
        }
      }
    }

    if (bordersBlack && !bordersWhite) totals.blackTerritory += regionSize;
    else if (bordersWhite && !bordersBlack) totals.whiteTerritory += regionSize;
    else totals.dame += regionSize;
  }

  const black = totals.blackStones + totals.blackTerritory;
  const white = totals.whiteStones + totals.whiteTerritory;
  return {
    ...totals,
    komi: board.komi,
    score: black - white - board.komi,
  };
}

/** Positive favors Black, negative favors White */
export function estimateScore(board: GoBoard): number {
  return scoreBreakdown(board).score;
}

/** GTP-style result such as "B+3.5", "W+6.5" or "0" */
export function formatResult(board: GoBoard): string {
  return formatScore(estimateScore(board));
}

export function formatScore(score: number): string {
  if (score === 0) return '0';
  return score > 0 ? `B+${score}` : `W+${-score}`;
}
