import { mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseLevel } from '../model/parser';
import { Level } from '../model/types';

export interface StoredLevel {
  number: number;
  path: string;
  text: string;
  level: Level;
}

/**
 * A CLI argument is either a path to a text file or the text itself
 */
export async function readTextArg(value: string): Promise<string> {
  try {
    const info = await stat(value);
    if (info.isFile()) {
      return (await readFile(value, 'utf-8')).trim();
    }
  } catch (e) {
    if (!isMissingFileError(e)) throw e;
  }
  return value.trim();
}

function isMissingFileError(e: unknown): boolean {
  if (!(e instanceof Error) || !('code' in e)) return false;
  return e.code === 'ENOENT' || e.code === 'ENAMETOOLONG' || e.code === 'ENOTDIR';
}

/** Numeric stem of `<n>.level`, or null */
export function levelNumberFromPath(file: string): number | null {
  const stem = path.basename(file, path.extname(file));
  return /^\d+$/.test(stem) ? Number(stem) : null;
}

export async function saveLevelText(dir: string, levelNumber: number, text: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, `${levelNumber}.level`);
  await writeFile(file, `${text}\n`, 'utf-8');
  return file;
}

export async function saveSolutionText(dir: string, levelNumber: number, attempt: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, `${levelNumber}.solution`);
  await writeFile(file, `${attempt}\n`, 'utf-8');
  return file;
}

/**
 * Numbered level files in a directory, in numeric order, optionally limited to start..end
 */
export async function listLevelFiles(dir: string, start?: number, end?: number): Promise<{ number: number; path: string }[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => ({ number: levelNumberFromPath(entry.name), path: path.join(dir, entry.name) }))
    .filter((entry): entry is { number: number; path: string } => entry.number !== null)
    .filter((entry) => (start === undefined || entry.number >= start) && (end === undefined || entry.number <= end))
    .sort((a, b) => a.number - b.number);
}

export async function loadLevelFile(file: string): Promise<StoredLevel> {
  const text = (await readFile(file, 'utf-8')).trim();
  return {
    number: levelNumberFromPath(file) ?? -1,
    path: file,
    text,
    level: parseLevel(text),
  };
}
