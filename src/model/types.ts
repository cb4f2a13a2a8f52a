/**
 * Core type definitions for the Modulo puzzle engine
 */

// ===== Geometry =====

/** Board or piece coordinate; x is the column, y the row. */
export type Coord = [x: number, y: number];

/**
 * Piece cells in canonical form: translated so min x and min y are 0,
 * sorted by x then y.
 */
export type Piece = readonly Coord[];

/**
 * Cell values in [0, depth), indexed column-major: board[x][y].
 */
export type Board = number[][];

// ===== Level Types =====

export interface Level {
  width: number;
  height: number;
  /** Modulus applied to every cell (>= 2) */
  depth: number;
  board: Board;
  /** Applied in this order; order is part of the puzzle */
  pieces: readonly Piece[];
  /** Optional level number, echoed by the codec */
  level?: number;
}

/** Top-left offset for the piece at the same index. */
export type Move = [offx: number, offy: number];

export type Attempt = Move[];

export interface GeneratedLevel {
  level: Level;
  /** Moves the generator stamped with; solves the level by construction */
  solution: Attempt;
}

// ===== Validation Types =====

export interface ValidationIssue {
  level: 'info' | 'warning' | 'error';
  message: string;
}

export interface ValidationReport {
  ok: boolean;
  issues: ValidationIssue[];
}

export type VerifyFailure =
  | { kind: 'out_of_bounds'; pieceIndex: number; offset: Move }
  | { kind: 'residue'; x: number; y: number; value: number };

export interface VerifyResult {
  solved: boolean;
  /** "Solved" or a fixed-format diagnostic */
  message: string;
  failure?: VerifyFailure;
}

// ===== Solver Types =====

export interface Placement {
  offx: number;
  offy: number;
  /** Flat indices (x + y * width) the piece covers at this offset */
  cells: number[];
}

export interface SolverStats {
  nodes: number;
  memoHits: number;
  backtracks: number;
  timeMs: number;
}

export interface SolverConfig {
  /** Bail out when total placement options exceed this... */
  maxPlacements: number;
  /** ...and the board area exceeds this */
  maxAreaForFullSearch: number;
  debugLevel: 0 | 1 | 2; // 0=off, 1=basic, 2=verbose
}

export type SolveResult =
  | { status: 'solved'; moves: Attempt; attempt: string; stats: SolverStats }
  | { status: 'unsat' | 'bailed'; explanation: string; stats: SolverStats };

// ===== Generator Types =====

export interface GeneratorConfig {
  seedBase: number;
  /** Odd multiplier applied to the level index when deriving its seed */
  seedMultiplier: number;
  /** Minimum board side before pieces are drawn */
  baseSize: number;
  /** Target ceiling for total piece mass / board area */
  density: number;
  /** Largest board side; offsets are written as two hex digits */
  maxBoardSize: number;
  debugLevel: 0 | 1 | 2;
}

export interface CatalogConfig {
  /** Largest bounding-box span a sampled shape may have */
  maxSize: number;
  samplesPerSize: number;
  seed: number;
}

export interface ModuloConfig {
  generator: GeneratorConfig;
  catalog: CatalogConfig;
  solver: SolverConfig;
}
