/**
 * Parser and serializer for the level text format:
 *   x=<w>&y=<h>&depth=<d>&board=<digits>&pieces=<grid>|<grid>...&level=<n>
 */

import { z } from 'zod';
import { LevelParseError } from './errors';
import { parsePiece, pieceToString } from './piece';
import { Board, Level, Piece } from './types';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/** Decimal integer field; exponents, hex and fractions are rejected */
const integerField = (key: string, min: number, minMessage: string) =>
  z
    .string({ required_error: `Level must include ${key}` })
    .regex(INTEGER_PATTERN, `${key} must be an integer`)
    .pipe(z.coerce.number().int(`${key} must be an integer`).min(min, minMessage));

const LevelHeaderSchema = z.object({
  x: integerField('x', 1, 'x must be positive'),
  y: integerField('y', 1, 'y must be positive'),
  depth: integerField('depth', 2, 'depth must be at least 2'),
  board: z.string({ required_error: 'Level must include board' }),
  pieces: z.string({ required_error: 'Level must include pieces' }),
  level: z.string().optional(),
});

/**
 * Strip quotes and a leading ?/# so pasted URLs and quoted shell args parse
 */
function cleanLevelText(text: string): string {
  return text
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .replace(/^[?#]+/, '');
}

function readParams(text: string): Record<string, string> {
  const params: Record<string, string> = {};
  new URLSearchParams(cleanLevelText(text)).forEach((value, key) => {
    params[key] = value;
  });
  return params;
}

function parseBoard(raw: string, width: number, height: number, depth: number): Board {
  const digits = raw.replace(/[, \n\r\t]/g, '');
  const expected = width * height;
  if (digits.length !== expected) {
    throw new LevelParseError(`Board length ${digits.length} does not match x*y (${expected}).`);
  }
  const board: Board = Array.from({ length: width }, () => Array<number>(height).fill(0));
  for (let idx = 0; idx < digits.length; idx++) {
    const ch = digits[idx];
    if (ch < '0' || ch > '9') {
      throw new LevelParseError(`Invalid board character: '${ch}'`);
    }
    board[idx % width][Math.floor(idx / width)] = Number(ch) % depth;
  }
  return board;
}

function parsePieces(raw: string): Piece[] {
  const pieces = raw
    .split('|')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(parsePiece);
  if (pieces.length === 0) {
    throw new LevelParseError('Level contains no pieces.');
  }
  return pieces;
}

function parseLevelNumber(raw: string | undefined): number | undefined {
  if (!raw || !INTEGER_PATTERN.test(raw)) return undefined;
  return Number(raw);
}

export function parseLevel(text: string): Level {
  const parsed = LevelHeaderSchema.safeParse(readParams(text));
  if (!parsed.success) {
    const errors = parsed.error.issues.map((e: z.ZodIssue) => `${e.path.join('.')}: ${e.message}`);
    throw new LevelParseError(`Invalid level: ${errors.join(', ')}`);
  }
  const { x: width, y: height, depth } = parsed.data;

  return {
    width,
    height,
    depth,
    board: parseBoard(parsed.data.board, width, height, depth),
    pieces: parsePieces(parsed.data.pieces),
    level: parseLevelNumber(parsed.data.level),
  };
}

/**
 * Rows are emitted row-major and joined by commas, which the parser strips
 */
export function boardToString(board: Board, width: number, height: number): string {
  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = '';
    for (let x = 0; x < width; x++) {
      row += String(board[x][y]);
    }
    rows.push(row);
  }
  return rows.join(',');
}

export function serializeLevel(level: Level): string {
  const parts = [
    `x=${level.width}`,
    `y=${level.height}`,
    `depth=${level.depth}`,
    `board=${boardToString(level.board, level.width, level.height)}`,
    `pieces=${level.pieces.map(pieceToString).join('|')}`,
  ];
  if (level.level !== undefined) {
    parts.push(`level=${level.level}`);
  }
  return parts.join('&');
}
