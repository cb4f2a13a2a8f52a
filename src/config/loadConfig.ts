/**
 * Parser for YAML/JSON configuration overrides
 */

import { readFile } from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../model/errors';
import { ModuloConfig } from '../model/types';
import { ConfigOverrides, createConfig } from './defaults';

const DebugLevelSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

const GeneratorSchema = z
  .object({
    seedBase: z.number().int(),
    seedMultiplier: z
      .number()
      .int()
      .refine((n) => Math.abs(n % 2) === 1, 'seedMultiplier must be odd'),
    baseSize: z.number().int().min(1).max(0xff),
    density: z.number().positive(),
    maxBoardSize: z.number().int().min(1).max(0xff),
    debugLevel: DebugLevelSchema,
  })
  .partial()
  .strict();

const CatalogSchema = z
  .object({
    maxSize: z.number().int().min(1).max(16),
    samplesPerSize: z.number().int().positive(),
    seed: z.number().int(),
  })
  .partial()
  .strict();

const SolverSchema = z
  .object({
    maxPlacements: z.number().int().nonnegative(),
    maxAreaForFullSearch: z.number().int().nonnegative(),
    debugLevel: DebugLevelSchema,
  })
  .partial()
  .strict();

export const ConfigOverridesSchema = z
  .object({
    generator: GeneratorSchema.optional(),
    catalog: CatalogSchema.optional(),
    solver: SolverSchema.optional(),
  })
  .strict();

export function validateConfigOverrides(data: unknown): ConfigOverrides {
  const validated = ConfigOverridesSchema.safeParse(data ?? {});
  if (!validated.success) {
    const errors = validated.error.issues.map((e: z.ZodIssue) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${errors.join(', ')}`);
  }
  return validated.data;
}

/**
 * Parse a YAML (or JSON, which YAML accepts) document into a full config
 */
export function parseConfig(text: string): ModuloConfig {
  let data: unknown;
  try {
    data = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(`Configuration is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  return createConfig(validateConfigOverrides(data));
}

export async function loadConfigFile(path: string): Promise<ModuloConfig> {
  const text = await readFile(path, 'utf-8');
  return parseConfig(text);
}
