/**
 * Difficulty schedule: pure functions of the level number
 */

import { PieceCatalog } from '../catalog/pieceCatalog';
import { randomInt, Rng } from './rng';

export function pieceCountForLevel(level: number): number {
  if (level <= 0) return 2;
  if (level === 1) return 3;
  if (level === 2) return 4;
  return 5 + Math.floor((level - 2) / 3);
}

export function depthForLevel(level: number): number {
  let depth = 2;
  if (level > 10 && level % 2 === 0) depth = 3;
  if (level > 20 && level % 5 === 0) depth = 4;
  return depth;
}

/**
 * weights[mass] for mass 0..maxMass. Small masses are phased out as levels grow.
 */
export function massWeights(level: number): number[] {
  let maxMass = (level + 2) / 3 + 2;
  if (level > 15 && level % 3 === 0) maxMass = 7;
  if (level > 25 && level % 13 === 0) maxMass = 6;
  const maxMassInt = Math.max(1, Math.floor(maxMass));

  const weights = [0];
  for (let mass = 1; mass <= maxMassInt; mass++) {
    weights.push(mass === 1 ? 1 : 3);
  }

  if (level > 10 && weights.length > 2) {
    weights[1] = 0;
    weights[2] = 1;
  }
  if (level > 15 && weights.length > 3) {
    weights[2] = 0;
    weights[3] = 1;
  }
  return weights;
}

/**
 * Cumulative-weight draw of a mass present in the catalog
 */
export function pickMass(weights: readonly number[], catalog: PieceCatalog, rng: Rng): number {
  if (catalog.masses.length === 0) {
    throw new RangeError('Cannot pick a mass from an empty catalog');
  }
  const total = weights.reduce((a, b) => a + b, 0);
  if (total <= 0) {
    return catalog.masses[0];
  }
  if (!weights.some((weight, mass) => weight > 0 && catalog.has(mass))) {
    throw new RangeError('No weighted mass is present in the catalog');
  }
  for (;;) {
    let pick = randomInt(rng, total);
    let mass = 0;
    for (let idx = 0; idx < weights.length; idx++) {
      pick -= weights[idx];
      if (pick < 0) {
        mass = idx;
        break;
      }
    }
    if (catalog.has(mass)) return mass;
    // A built catalog covers 1..maxMass, so a redraw only happens with a
    // hand-made catalog (PieceCatalog.fromPieces) that has gaps.
  }
}
