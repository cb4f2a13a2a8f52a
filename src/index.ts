// Modulo puzzle engine - public API

export type {
  Attempt,
  Board,
  CatalogConfig,
  Coord,
  GeneratedLevel,
  GeneratorConfig,
  Level,
  ModuloConfig,
  Move,
  Piece,
  Placement,
  SolveResult,
  SolverConfig,
  SolverStats,
  ValidationIssue,
  ValidationReport,
  VerifyFailure,
  VerifyResult,
} from './model/types';

export { ModuloError, LevelParseError, EncodingError, GenerationLimitError, ConfigError } from './model/errors';

// Codec
export {
  canonicalizePiece,
  translatePiece,
  parsePiece,
  pieceToString,
  pieceDims,
  pieceKey,
  comparePieces,
} from './model/piece';
export { parseLevel, serializeLevel, boardToString } from './model/parser';
export { parseAttempt, encodeAttempt, MAX_OFFSET } from './model/attempt';

// Board arithmetic
export { floorMod, applyPiece, isSolved, createBoard, cloneBoard, fitsOnBoard } from './engine/board';

// Catalog and generation
export { PieceCatalog, growPiece, fallbackPiece } from './catalog/pieceCatalog';
export { generateLevel, generateLevels, seedForLevel } from './generator/generator';
export { pieceCountForLevel, depthForLevel, massWeights, pickMass } from './generator/schedule';
export { createRng, Mulberry32 } from './generator/rng';

// Solving and verification
export { solveLevel, solveToText, NO_SOLUTION_TEXT } from './solver/solver';
export { verifyAttempt, SOLVED_MESSAGE } from './validator/verifyAttempt';
export { validateLevel } from './validator/validateLevel';

// Configuration
export { DEFAULT_CONFIG, createConfig } from './config/defaults';
export { parseConfig, loadConfigFile } from './config/loadConfig';
