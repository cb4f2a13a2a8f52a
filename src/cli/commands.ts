/**
 * CLI commands. Each takes its own argv slice and an output sink and resolves
 * to an exit code; only `index.ts` touches `process`.
 */

import { parseArgs } from 'node:util';
import { PieceCatalog } from '../catalog/pieceCatalog';
import { createConfig } from '../config/defaults';
import { loadConfigFile } from '../config/loadConfig';
import { generateLevel } from '../generator/generator';
import { encodeAttempt } from '../model/attempt';
import { pieceDims } from '../model/piece';
import { parseLevel, serializeLevel } from '../model/parser';
import { ModuloConfig } from '../model/types';
import { renderLevel } from '../render/text';
import { NO_SOLUTION_TEXT, solveLevel } from '../solver/solver';
import { listLevelFiles, loadLevelFile, readTextArg, saveLevelText, saveSolutionText } from '../storage/levels';
import { verifyAttempt } from '../validator/verifyAttempt';
import { EXIT_ERROR, EXIT_FAILED, EXIT_OK, ExitCode } from './exitCodes';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Whole of standard input, for commands that fall back to it */
  readStdin(): Promise<string>;
  env: Record<string, string | undefined>;
  isTTY: boolean;
}

export type Command = (argv: string[], io: CliIO) => Promise<ExitCode>;

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[+-]?(\d+|0x[0-9a-f]+)$/i.test(value.trim())) {
    throw new RangeError(`--${name} must be an integer, got '${value}'`);
  }
  const negative = value.trim().startsWith('-');
  const magnitude = Number(value.trim().replace(/^[+-]/, ''));
  return negative ? -magnitude : magnitude;
}

async function resolveConfig(configPath: string | undefined, seedBase: number | undefined): Promise<ModuloConfig> {
  const config = configPath ? await loadConfigFile(configPath) : createConfig();
  if (seedBase !== undefined) {
    config.generator = { ...config.generator, seedBase };
  }
  return config;
}

export const generateCommand: Command = async (argv, io) => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'seed-base': { type: 'string' },
      solution: { type: 'boolean', default: false },
      config: { type: 'string' },
    },
  });
  const levelNumber = parseInteger('level', positionals[0]);
  if (levelNumber === undefined) {
    io.err('Error: level number required');
    return EXIT_ERROR;
  }
  const config = await resolveConfig(values.config, parseInteger('seed-base', values['seed-base']));
  const catalog = PieceCatalog.build(config.catalog);
  const generated = generateLevel(levelNumber, catalog, config.generator);
  io.out(serializeLevel(generated.level));
  if (values.solution) {
    io.out(encodeAttempt(generated.solution));
  }
  return EXIT_OK;
};

export const generateLevelsCommand: Command = async (argv, io) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      start: { type: 'string', default: '1' },
      end: { type: 'string', default: '100' },
      'output-dir': { type: 'string', default: 'levels' },
      'write-solutions': { type: 'boolean', default: false },
      'solutions-dir': { type: 'string', default: 'solutions' },
      'seed-base': { type: 'string' },
      config: { type: 'string' },
    },
  });
  const start = parseInteger('start', values.start) ?? 1;
  const end = parseInteger('end', values.end) ?? 100;
  if (end < start) {
    io.err('Error: --end must be >= --start');
    return EXIT_ERROR;
  }
  const config = await resolveConfig(values.config, parseInteger('seed-base', values['seed-base']));
  const catalog = PieceCatalog.build(config.catalog);
  const outputDir = values['output-dir'] ?? 'levels';

  for (let n = start; n <= end; n++) {
    const generated = generateLevel(n, catalog, config.generator);
    await saveLevelText(outputDir, n, serializeLevel(generated.level));
    if (values['write-solutions']) {
      await saveSolutionText(values['solutions-dir'] ?? 'solutions', n, encodeAttempt(generated.solution));
    }
    const { level } = generated;
    const maxW = Math.max(...level.pieces.map((p) => pieceDims(p)[0]));
    const maxH = Math.max(...level.pieces.map((p) => pieceDims(p)[1]));
    io.out(
      `Level ${n}: ${level.width}x${level.height} depth=${level.depth} pieces=${level.pieces.length} max-piece=${maxW}x${maxH}`
    );
  }
  io.out(`Wrote levels into ${outputDir} (latest: ${end}.level)`);
  return EXIT_OK;
};

export const solveCommand: Command = async (argv, io) => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { config: { type: 'string' } },
  });
  const raw = positionals[0] !== undefined ? await readTextArg(positionals[0]) : (await io.readStdin()).trim();
  if (!raw) {
    io.err('Error: empty level input');
    return EXIT_ERROR;
  }
  const config = await resolveConfig(values.config, undefined);
  const result = solveLevel(parseLevel(raw), config.solver);
  if (result.status !== 'solved') {
    io.out(NO_SOLUTION_TEXT);
    return EXIT_FAILED;
  }
  io.out(result.attempt);
  return EXIT_OK;
};

export const verifyCommand: Command = async (argv, io) => {
  const { positionals } = parseArgs({ args: argv, allowPositionals: true, options: {} });
  if (positionals.length !== 2) {
    io.err('Error: usage: modulo verify <level> <attempt>');
    return EXIT_ERROR;
  }
  const level = parseLevel(await readTextArg(positionals[0]));
  const result = verifyAttempt(level, await readTextArg(positionals[1]));
  io.out(result.message);
  return result.solved ? EXIT_OK : EXIT_FAILED;
};

export const showCommand: Command = async (argv, io) => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      pieces: { type: 'boolean', default: false },
      'no-color': { type: 'boolean', default: false },
    },
  });
  if (positionals[0] === undefined) {
    io.err('Error: level required');
    return EXIT_ERROR;
  }
  const level = parseLevel(await readTextArg(positionals[0]));
  const useColor = io.isTTY && !values['no-color'] && !io.env.NO_COLOR;
  io.out(renderLevel(level, { useColor, showPieces: values.pieces ?? false }));
  return EXIT_OK;
};

/**
 * Solve every numbered level in a directory and check each answer with the verifier
 */
export const evaluateCommand: Command = async (argv, io) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      'levels-dir': { type: 'string', default: 'levels' },
      start: { type: 'string', default: '1' },
      end: { type: 'string' },
      config: { type: 'string' },
    },
  });
  const start = parseInteger('start', values.start) ?? 1;
  const end = parseInteger('end', values.end);
  const config = await resolveConfig(values.config, undefined);
  const files = await listLevelFiles(values['levels-dir'] ?? 'levels', start, end);
  if (files.length === 0) {
    io.out(`No levels found between ${start} and ${end ?? 'end'}`);
    return EXIT_FAILED;
  }

  for (const file of files) {
    const stored = await loadLevelFile(file.path);
    const { level } = stored;
    const label = `Level ${stored.number} (${level.width}x${level.height}, depth=${level.depth}, pieces=${level.pieces.length})`;
    const startTime = Date.now();
    const result = solveLevel(level, config.solver);
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(3);
    if (result.status !== 'solved') {
      io.out(`${label}: FAIL (${elapsed}s)`);
      io.out(`  Error: ${NO_SOLUTION_TEXT} (${result.explanation})`);
      return EXIT_FAILED;
    }
    const verdict = verifyAttempt(level, result.attempt);
    if (!verdict.solved) {
      io.out(`${label}: FAIL (${elapsed}s)`);
      io.out(`  Error: ${verdict.message}`);
      return EXIT_FAILED;
    }
    io.out(`${label}: PASS (${elapsed}s)`);
  }
  return EXIT_OK;
};

export const COMMANDS = new Map<string, Command>([
  ['generate', generateCommand],
  ['generate-levels', generateLevelsCommand],
  ['solve', solveCommand],
  ['verify', verifyCommand],
  ['show', showCommand],
  ['evaluate', evaluateCommand],
]);

export const USAGE = [
  'Usage: modulo <command> [options]',
  '',
  'Commands:',
  '  generate <level> [--seed-base N] [--solution] [--config file]',
  '  generate-levels [--start N] [--end N] [--output-dir dir] [--write-solutions] [--solutions-dir dir]',
  '  solve [level]            level text or file; stdin when omitted',
  '  verify <level> <attempt>',
  '  show <level> [--pieces] [--no-color]',
  '  evaluate [--levels-dir dir] [--start N] [--end N]',
].join('\n');

/**
 * Dispatch argv (without node and script) and map thrown errors to exit code 2
 */
export async function runCli(argv: string[], io: CliIO): Promise<ExitCode> {
  const [name, ...rest] = argv;
  const command = name !== undefined ? COMMANDS.get(name) : undefined;
  if (!command) {
    io.err(USAGE);
    return EXIT_ERROR;
  }
  try {
    return await command(rest, io);
  } catch (e) {
    io.err(`Error: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_ERROR;
  }
}
