/**
 * Piece geometry and the `X`/`.` grid text form
 */

import { LevelParseError } from './errors';
import { Coord, Piece } from './types';

/**
 * Translate to the origin and sort by x, then y
 */
export function canonicalizePiece(coords: Iterable<readonly [number, number]>): Piece {
  const list = Array.from(coords, ([x, y]): Coord => [x, y]);
  if (list.length === 0) {
    throw new LevelParseError('Piece has no squares.');
  }
  const minX = Math.min(...list.map(([x]) => x));
  const minY = Math.min(...list.map(([, y]) => y));
  return list
    .map(([x, y]): Coord => [x - minX, y - minY])
    .sort(compareCoords);
}

export function translatePiece(piece: Piece, dx: number, dy: number): Coord[] {
  return piece.map(([x, y]): Coord => [x + dx, y + dy]);
}

export function compareCoords(a: readonly [number, number], b: readonly [number, number]): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * Lexicographic order over coordinates; a prefix sorts first
 */
export function comparePieces(a: Piece, b: Piece): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const diff = compareCoords(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/** Stable identity for deduplication. */
export function pieceKey(piece: Piece): string {
  return piece.map(([x, y]) => `${x},${y}`).join(';');
}

export function piecesEqual(a: Piece, b: Piece): boolean {
  return a.length === b.length && comparePieces(a, b) === 0;
}

/**
 * Bounding box of a canonical piece as [width, height]
 */
export function pieceDims(piece: Piece): [width: number, height: number] {
  let width = 0;
  let height = 0;
  for (const [x, y] of piece) {
    width = Math.max(width, x + 1);
    height = Math.max(height, y + 1);
  }
  return [width, height];
}

export function isCanonical(piece: Piece): boolean {
  if (piece.length === 0) return false;
  return piecesEqual(piece, canonicalizePiece(piece)) && new Set(piece.map(([x, y]) => `${x},${y}`)).size === piece.length;
}

/**
 * Parse a grid such as "XX.,.XX": `,` ends a row, `X`/`x` is filled, `.` is empty.
 * Whitespace is ignored.
 */
export function parsePiece(text: string): Piece {
  let x = 0;
  let y = 0;
  const coords: Coord[] = [];
  for (const ch of text.trim()) {
    if (ch === ',') {
      x = 0;
      y += 1;
      continue;
    }
    if (ch === 'X' || ch === 'x') {
      coords.push([x, y]);
    } else if (/\s/.test(ch)) {
      continue;
    } else if (ch !== '.') {
      throw new LevelParseError(`Invalid piece character: '${ch}'`);
    }
    x += 1;
  }
  return canonicalizePiece(coords);
}

export function pieceToString(piece: Piece): string {
  const [width, height] = pieceDims(piece);
  const grid = Array.from({ length: height }, () => Array<string>(width).fill('.'));
  for (const [x, y] of piece) {
    grid[y][x] = 'X';
  }
  return grid.map((row) => row.join('')).join(',');
}
