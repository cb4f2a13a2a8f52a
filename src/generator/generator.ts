/**
 * Level generator: draws pieces from the catalog, sizes the board, and stamps
 * each piece at a random offset with delta -1 so that +1 at the same offsets
 * restores an all-zero board.
 */

import { PieceCatalog } from '../catalog/pieceCatalog';
import { DEFAULT_CONFIG } from '../config/defaults';
import { applyPiece, createBoard } from '../engine/board';
import { GenerationLimitError } from '../model/errors';
import { pieceDims } from '../model/piece';
import { Attempt, GeneratedLevel, GeneratorConfig, Piece } from '../model/types';
import { createRng, randomBit, randomChoice, randomInt } from './rng';
import { depthForLevel, massWeights, pickMass, pieceCountForLevel } from './schedule';

export function seedForLevel(level: number, config: GeneratorConfig = DEFAULT_CONFIG.generator): number {
  return config.seedBase + level * config.seedMultiplier;
}

export function generateLevel(
  levelNumber: number,
  catalog: PieceCatalog,
  config: GeneratorConfig = DEFAULT_CONFIG.generator
): GeneratedLevel {
  const rng = createRng(seedForLevel(levelNumber, config));
  const depth = depthForLevel(levelNumber);
  const weights = massWeights(levelNumber);

  let width = config.baseSize;
  let height = config.baseSize;
  const pieces: Piece[] = [];
  let totalMass = 0;

  for (let i = 0; i < pieceCountForLevel(levelNumber); i++) {
    const mass = pickMass(weights, catalog, rng);
    const piece = randomChoice(rng, catalog.shapesOf(mass));
    const [pw, ph] = pieceDims(piece);
    width = Math.max(width, pw);
    height = Math.max(height, ph);
    pieces.push(piece);
    totalMass += piece.length;
  }

  while (totalMass / (width * height) > config.density && width <= config.maxBoardSize && height <= config.maxBoardSize) {
    if (randomBit(rng)) {
      width += 1;
    } else {
      height += 1;
    }
  }
  if (width > config.maxBoardSize || height > config.maxBoardSize) {
    throw new GenerationLimitError(
      `Generated board ${width}x${height} exceeds hex coordinate limits (max ${config.maxBoardSize}).`
    );
  }

  const board = createBoard(width, height);
  const solution: Attempt = [];
  for (const piece of pieces) {
    const [pw, ph] = pieceDims(piece);
    const offx = randomInt(rng, width - pw + 1);
    const offy = randomInt(rng, height - ph + 1);
    applyPiece(board, piece, depth, offx, offy, -1);
    solution.push([offx, offy]);
  }

  if (config.debugLevel >= 1) {
    console.log(
      `[Generator] Level ${levelNumber}: ${width}x${height} depth=${depth} pieces=${pieces.length} mass=${totalMass}`
    );
  }

  return {
    level: { width, height, depth, board, pieces, level: levelNumber },
    solution,
  };
}

/**
 * Generate levels start..end inclusive
 */
export function generateLevels(
  start: number,
  end: number,
  catalog: PieceCatalog,
  config: GeneratorConfig = DEFAULT_CONFIG.generator
): GeneratedLevel[] {
  if (end < start) {
    throw new RangeError('end must be >= start');
  }
  const levels: GeneratedLevel[] = [];
  for (let n = start; n <= end; n++) {
    levels.push(generateLevel(n, catalog, config));
  }
  return levels;
}
