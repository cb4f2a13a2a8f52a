import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigError } from '../../model/errors';
import { createConfig, DEFAULT_CONFIG, definedOverrides } from '../defaults';
import { loadConfigFile, parseConfig, validateConfigOverrides } from '../loadConfig';

describe('createConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(createConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges each section separately', () => {
    const config = createConfig({ solver: { maxPlacements: 10 } });
    expect(config.solver).toEqual({ ...DEFAULT_CONFIG.solver, maxPlacements: 10 });
    expect(config.generator).toEqual(DEFAULT_CONFIG.generator);
  });

  it('keeps defaults for keys explicitly set to undefined', () => {
    const config = createConfig({ catalog: { maxSize: undefined, seed: 7 }, solver: { debugLevel: undefined } });
    expect(config.catalog).toEqual({ ...DEFAULT_CONFIG.catalog, seed: 7 });
    expect(config.solver).toEqual(DEFAULT_CONFIG.solver);
  });
});

describe('definedOverrides', () => {
  it('drops undefined entries and keeps falsy values', () => {
    const result = definedOverrides<{ a: number; b: number; c: boolean }>({ a: undefined, b: 0, c: false });
    expect(Object.keys(result)).toEqual(['b', 'c']);
    expect(result).toStrictEqual({ b: 0, c: false });
    expect(definedOverrides()).toEqual({});
  });
});

describe('parseConfig', () => {
  it('treats an empty document as no overrides', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG);
  });

  it('applies YAML overrides', () => {
    const config = parseConfig(['generator:', '  seedBase: 100', '  debugLevel: 1', 'catalog:', '  maxSize: 4'].join('\n'));
    expect(config.generator.seedBase).toBe(100);
    expect(config.generator.debugLevel).toBe(1);
    expect(config.generator.density).toBe(2.9);
    expect(config.catalog).toEqual({ ...DEFAULT_CONFIG.catalog, maxSize: 4 });
  });

  it('accepts JSON', () => {
    expect(parseConfig('{"solver": {"maxAreaForFullSearch": 9}}').solver.maxAreaForFullSearch).toBe(9);
  });

  it('rejects an even seed multiplier', () => {
    expect(() => parseConfig('generator:\n  seedMultiplier: 8')).toThrow(
      'Invalid configuration: generator.seedMultiplier: seedMultiplier must be odd'
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig('solver:\n  timeout: 5')).toThrow(ConfigError);
    expect(() => parseConfig('renderer: {}')).toThrow(ConfigError);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseConfig('42')).toThrow(/^Invalid configuration: \(root\): /);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfig('generator: [1, 2')).toThrow(/^Configuration is not valid YAML: /);
  });
});

describe('validateConfigOverrides', () => {
  it('accepts null as no overrides', () => {
    expect(validateConfigOverrides(null)).toEqual({});
  });

  it('rejects a debug level outside 0..2', () => {
    expect(() => validateConfigOverrides({ solver: { debugLevel: 3 } })).toThrow(ConfigError);
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'modulo-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a config file from disk', async () => {
    const file = path.join(dir, 'modulo.yaml');
    await writeFile(file, 'generator:\n  baseSize: 4\n', 'utf-8');
    const config = await loadConfigFile(file);
    expect(config.generator.baseSize).toBe(4);
  });

  it('propagates a missing file', async () => {
    await expect(loadConfigFile(path.join(dir, 'missing.yaml'))).rejects.toThrow(/ENOENT/);
  });
});
