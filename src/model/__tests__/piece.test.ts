/**
 * Tests for piece geometry and the grid text form
 */

import { growPiece } from '../../catalog/pieceCatalog';
import { createRng } from '../../generator/rng';
import { LevelParseError } from '../errors';
import {
  canonicalizePiece,
  comparePieces,
  isCanonical,
  parsePiece,
  pieceDims,
  pieceKey,
  pieceToString,
  translatePiece,
} from '../piece';
import { Piece } from '../types';

function samplePieces(count: number, seed: number): Piece[] {
  const rng = createRng(seed);
  return Array.from({ length: count }, (_, i) => growPiece(1 + (i % 6), rng));
}

describe('canonicalizePiece', () => {
  it('translates to the origin and sorts by x then y', () => {
    expect(canonicalizePiece([[3, 5], [2, 7]])).toEqual([
      [0, 2],
      [1, 0],
    ]);
  });

  it('rejects an empty coordinate list', () => {
    expect(() => canonicalizePiece([])).toThrow(LevelParseError);
    expect(() => canonicalizePiece([])).toThrow('Piece has no squares.');
  });

  it('is idempotent', () => {
    for (const piece of samplePieces(200, 7)) {
      expect(canonicalizePiece(canonicalizePiece(piece))).toEqual(canonicalizePiece(piece));
    }
  });

  it('ignores translation', () => {
    const vectors: [number, number][] = [
      [0, 0],
      [4, 1],
      [-3, 9],
      [-12, -5],
    ];
    for (const piece of samplePieces(100, 11)) {
      for (const [dx, dy] of vectors) {
        expect(canonicalizePiece(translatePiece(piece, dx, dy))).toEqual(canonicalizePiece(piece));
      }
    }
  });
});

describe('parsePiece', () => {
  it('reads rows separated by commas', () => {
    expect(parsePiece('XX,.X')).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
    ]);
  });

  it('accepts lowercase x and ignores whitespace', () => {
    expect(parsePiece(' .x,\nx x ')).toEqual([
      [0, 1],
      [1, 0],
      [1, 1],
    ]);
  });

  it('canonicalizes leading empty columns away', () => {
    expect(parsePiece('..X')).toEqual([[0, 0]]);
  });

  it('rejects unknown characters', () => {
    expect(() => parsePiece('X?')).toThrow("Invalid piece character: '?'");
  });

  it('rejects a grid with no filled cells', () => {
    expect(() => parsePiece('...')).toThrow('Piece has no squares.');
  });
});

describe('pieceToString', () => {
  it('writes the canonical grid', () => {
    expect(pieceToString(parsePiece('XX,.X'))).toBe('XX,.X');
    expect(pieceToString(parsePiece('.X.,XXX'))).toBe('.X.,XXX');
  });

  it('round-trips sampled shapes', () => {
    for (const piece of samplePieces(100, 3)) {
      expect(parsePiece(pieceToString(piece))).toEqual(piece);
    }
  });
});

describe('piece helpers', () => {
  it('reports the bounding box', () => {
    expect(pieceDims(parsePiece('XXX,X..'))).toEqual([3, 2]);
    expect(pieceDims(parsePiece('X'))).toEqual([1, 1]);
  });

  it('orders pieces lexicographically with prefixes first', () => {
    const single = parsePiece('X');
    const column = parsePiece('X,X');
    const row = parsePiece('XX');
    expect(comparePieces(single, column)).toBeLessThan(0);
    expect(comparePieces(column, row)).toBeLessThan(0);
    expect(comparePieces(row, row)).toBe(0);
  });

  it('keys equal shapes identically', () => {
    expect(pieceKey(parsePiece('X.,XX'))).toBe(pieceKey(canonicalizePiece([[5, 5], [5, 6], [6, 6]])));
    expect(pieceKey(parsePiece('XX'))).toBe('0,0;1,0');
  });

  it('detects non-canonical pieces', () => {
    expect(isCanonical(parsePiece('X,X'))).toBe(true);
    expect(isCanonical([[1, 0]])).toBe(false);
    expect(isCanonical([[0, 1], [0, 0]])).toBe(false);
    expect(isCanonical([])).toBe(false);
  });
});
