/**
 * Exhaustive backtracking solver with (piece index, board) memoization
 */

import { DEFAULT_CONFIG } from '../config/defaults';
import { applyDeltaFlat, FlatBoard, flattenBoard, isFlatSolved } from '../engine/board';
import { encodeAttempt } from '../model/attempt';
import { LevelParseError } from '../model/errors';
import { Attempt, Level, Placement, SolveResult, SolverConfig, SolverStats } from '../model/types';
import { validateLevel } from '../validator/validateLevel';
import { bailOutReason, placementsForLevel } from './placements';

export const NO_SOLUTION_TEXT = 'No solution found';

/**
 * State key for the visited set: piece index, then cell values in flat order
 */
export function stateKey(index: number, flat: FlatBoard): string {
  return `${index}:${flat.join(',')}`;
}

interface SearchContext {
  depth: number;
  flat: FlatBoard;
  placements: Placement[][];
  moves: Attempt;
  seen: Set<string>;
  stats: SolverStats;
}

function search(ctx: SearchContext, index: number): boolean {
  const key = stateKey(index, ctx.flat);
  if (ctx.seen.has(key)) {
    ctx.stats.memoHits += 1;
    return false;
  }
  ctx.seen.add(key);

  if (index === ctx.placements.length) {
    return isFlatSolved(ctx.flat);
  }

  for (const placement of ctx.placements[index]) {
    ctx.stats.nodes += 1;
    applyDeltaFlat(ctx.flat, placement.cells, ctx.depth, 1);
    ctx.moves[index] = [placement.offx, placement.offy];
    if (search(ctx, index + 1)) {
      return true;
    }
    applyDeltaFlat(ctx.flat, placement.cells, ctx.depth, -1);
    ctx.stats.backtracks += 1;
  }
  return false;
}

/**
 * Solve a level. "No solution" (including the size bail-out) is a result,
 * not an error; a structurally invalid level throws.
 */
export function solveLevel(level: Level, config: SolverConfig = DEFAULT_CONFIG.solver): SolveResult {
  const report = validateLevel(level);
  if (!report.ok) {
    const errors = report.issues.filter((i) => i.level === 'error').map((i) => i.message);
    throw new LevelParseError(`Invalid level: ${errors.join('; ')}`);
  }

  const startTime = Date.now();
  const stats: SolverStats = { nodes: 0, memoHits: 0, backtracks: 0, timeMs: 0 };
  const placements = placementsForLevel(level);

  const reason = bailOutReason(level, placements, config.maxPlacements, config.maxAreaForFullSearch);
  if (reason) {
    if (config.debugLevel >= 2) {
      console.log(`[Solver] Bailing out: ${reason}; placements per piece: ${placements.map((p) => p.length).join(',')}`);
    }
    return { status: 'bailed', explanation: reason, stats };
  }

  const ctx: SearchContext = {
    depth: level.depth,
    flat: flattenBoard(level),
    placements,
    moves: level.pieces.map((): [number, number] => [0, 0]),
    seen: new Set(),
    stats,
  };
  const found = search(ctx, 0);
  stats.timeMs = Date.now() - startTime;

  if (config.debugLevel >= 1) {
    console.log(
      `[Solver] ${found ? 'Solved' : 'Exhausted'} after ${stats.nodes} nodes, ${stats.memoHits} memo hits, ${stats.timeMs}ms`
    );
  }

  if (!found) {
    return { status: 'unsat', explanation: 'Search space exhausted', stats };
  }
  return { status: 'solved', moves: ctx.moves, attempt: encodeAttempt(ctx.moves), stats };
}

/** Attempt text, or the no-solution sentinel */
export function solveToText(level: Level, config?: SolverConfig): string {
  const result = solveLevel(level, config);
  return result.status === 'solved' ? result.attempt : NO_SOLUTION_TEXT;
}
