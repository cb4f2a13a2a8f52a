/**
 * Tests for the procedural shape catalog
 */

import { createRng } from '../../generator/rng';
import { comparePieces, isCanonical, parsePiece, pieceDims, pieceKey } from '../../model/piece';
import { fallbackPiece, growPiece, PieceCatalog } from '../pieceCatalog';

describe('growPiece', () => {
  it('returns a single cell for size limit 1', () => {
    const rng = createRng(5);
    for (let i = 0; i < 20; i++) {
      expect(growPiece(1, rng)).toEqual([[0, 0]]);
    }
  });

  it('keeps the bounding box within the size limit', () => {
    const rng = createRng(9);
    for (let limit = 1; limit <= 6; limit++) {
      for (let i = 0; i < 100; i++) {
        const piece = growPiece(limit, rng);
        const [w, h] = pieceDims(piece);
        expect(w).toBeLessThanOrEqual(limit);
        expect(h).toBeLessThanOrEqual(limit);
        expect(isCanonical(piece)).toBe(true);
      }
    }
  });

  it('grows connected shapes', () => {
    const rng = createRng(13);
    for (let i = 0; i < 50; i++) {
      const piece = growPiece(4, rng);
      const cells = new Set(piece.map(([x, y]) => `${x},${y}`));
      const start = `${piece[0][0]},${piece[0][1]}`;
      const seen = new Set<string>([start]);
      const stack = [start];
      while (stack.length > 0) {
        const [x, y] = (stack.pop() ?? '').split(',').map(Number);
        for (const [nx, ny] of [
          [x + 1, y],
          [x - 1, y],
          [x, y + 1],
          [x, y - 1],
        ]) {
          const key = `${nx},${ny}`;
          if (cells.has(key) && !seen.has(key)) {
            seen.add(key);
            stack.push(key);
          }
        }
      }
      expect(seen.size).toBe(cells.size);
    }
  });
});

describe('fallbackPiece', () => {
  it('fills a row-major rectangle capped at maxSize wide', () => {
    expect(fallbackPiece(4, 6)).toEqual(parsePiece('XXXX'));
    expect(fallbackPiece(7, 6)).toEqual(parsePiece('XXXXXX,X.....'));
    expect(fallbackPiece(6, 3)).toEqual(parsePiece('XXX,XXX'));
  });
});

describe('PieceCatalog', () => {
  const catalog = PieceCatalog.build({ maxSize: 3, samplesPerSize: 300, seed: 1 });

  it('covers every mass from 1 to its maximum', () => {
    expect(catalog.masses[0]).toBe(1);
    for (let mass = 1; mass <= catalog.maxMass; mass++) {
      expect(catalog.has(mass)).toBe(true);
      expect(catalog.shapesOf(mass).length).toBeGreaterThan(0);
    }
    expect(catalog.masses).toHaveLength(catalog.maxMass);
  });

  it('stores sorted, distinct, canonical shapes of the right mass', () => {
    for (const mass of catalog.masses) {
      const shapes = catalog.shapesOf(mass);
      const keys = new Set(shapes.map(pieceKey));
      expect(keys.size).toBe(shapes.length);
      shapes.forEach((shape, i) => {
        expect(shape).toHaveLength(mass);
        expect(isCanonical(shape)).toBe(true);
        if (i > 0) {
          expect(comparePieces(shapes[i - 1], shape)).toBeLessThan(0);
        }
      });
    }
  });

  it('respects the size limit', () => {
    for (const mass of catalog.masses) {
      for (const shape of catalog.shapesOf(mass)) {
        const [w, h] = pieceDims(shape);
        expect(Math.max(w, h)).toBeLessThanOrEqual(3);
      }
    }
  });

  it('is deterministic for a seed', () => {
    const again = PieceCatalog.build({ maxSize: 3, samplesPerSize: 300, seed: 1 });
    expect(again.masses).toEqual(catalog.masses);
    for (const mass of catalog.masses) {
      expect(again.shapesOf(mass).map(pieceKey)).toEqual(catalog.shapesOf(mass).map(pieceKey));
    }
  });

  it('throws for an absent mass', () => {
    expect(catalog.has(catalog.maxMass + 1)).toBe(false);
    expect(() => catalog.shapesOf(catalog.maxMass + 1)).toThrow(RangeError);
  });

  it('cannot be mutated through shapesOf', () => {
    expect(Object.isFrozen(catalog.shapesOf(1))).toBe(true);
  });

  it('finds all shapes of mass 1 and 2', () => {
    expect(catalog.shapesOf(1)).toEqual([[[0, 0]]]);
    expect(catalog.shapesOf(2).map(pieceKey)).toEqual(['0,0;0,1', '0,0;1,0']);
  });
});

describe('PieceCatalog.build options', () => {
  it('uses the default for an option passed as undefined', () => {
    const catalog = PieceCatalog.build({ maxSize: undefined, samplesPerSize: 50, seed: 4 });
    expect(catalog.size).toBeGreaterThan(0);
    for (const mass of catalog.masses) {
      for (const shape of catalog.shapesOf(mass)) {
        const [w, h] = pieceDims(shape);
        expect(Math.max(w, h)).toBeLessThanOrEqual(6);
      }
    }
    expect(PieceCatalog.build({ maxSize: 2, samplesPerSize: undefined, seed: 4 }).masses).toEqual([1, 2, 3, 4]);
  });
});

describe('PieceCatalog.fromPieces', () => {
  it('groups by mass and drops translated duplicates', () => {
    const catalog = PieceCatalog.fromPieces([
      parsePiece('XX'),
      [
        [4, 4],
        [5, 4],
      ],
      parsePiece('X'),
      parsePiece('X,X,X'),
    ]);
    expect(catalog.masses).toEqual([1, 2, 3]);
    expect(catalog.shapesOf(2)).toHaveLength(1);
    expect(catalog.size).toBe(3);
  });
});
