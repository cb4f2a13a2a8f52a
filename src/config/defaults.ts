/**
 * Modulo configuration
 *
 * Default values and the override factory for generator, catalog and solver settings.
 */

import { ModuloConfig } from '../model/types';

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_CONFIG: ModuloConfig = {
  generator: {
    seedBase: 0x5eed,
    seedMultiplier: 7919,
    baseSize: 3,
    density: 2.9,
    /** Offsets are written as two hex digits, so no side may exceed 0xff */
    maxBoardSize: 0xff,
    debugLevel: 0,
  },
  catalog: {
    maxSize: 6,
    samplesPerSize: 6000,
    seed: 0xc0de,
  },
  solver: {
    maxPlacements: 8000,
    maxAreaForFullSearch: 64,
    debugLevel: 0,
  },
};

// =============================================================================
// Configuration Factory
// =============================================================================

export interface ConfigOverrides {
  generator?: Partial<ModuloConfig['generator']>;
  catalog?: Partial<ModuloConfig['catalog']>;
  solver?: Partial<ModuloConfig['solver']>;
}

/**
 * Copy of an override section without keys set to undefined, so spreading it
 * never replaces a default with undefined
 */
export function definedOverrides<T extends object>(values: Partial<T> = {}): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}

/**
 * Create config with overrides
 */
export function createConfig(overrides: ConfigOverrides = {}): ModuloConfig {
  return {
    generator: {
      ...DEFAULT_CONFIG.generator,
      ...definedOverrides<ModuloConfig['generator']>(overrides.generator),
    },
    catalog: {
      ...DEFAULT_CONFIG.catalog,
      ...definedOverrides<ModuloConfig['catalog']>(overrides.catalog),
    },
    solver: {
      ...DEFAULT_CONFIG.solver,
      ...definedOverrides<ModuloConfig['solver']>(overrides.solver),
    },
  };
}
