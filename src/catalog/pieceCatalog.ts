/**
 * Procedural polyomino catalog, indexed by mass (cell count)
 */

import { canonicalizePiece, comparePieces, pieceKey } from '../model/piece';
import { CatalogConfig, Coord, Piece } from '../model/types';
import { createRng, randomBit, randomChoice, Rng } from '../generator/rng';
import { DEFAULT_CONFIG, definedOverrides } from '../config/defaults';

/**
 * Random walk: keep adding a neighbour of a random occupied cell until the
 * bounding box spans more than sizeLimit on either axis, then return the shape
 * from before that step.
 */
export function growPiece(sizeLimit: number, rng: Rng): Piece {
  const squares: Coord[] = [[0, 0]];
  const occupied = new Set<string>(['0,0']);
  let minX = 0;
  let maxX = 0;
  let minY = 0;
  let maxY = 0;
  for (;;) {
    let [x, y] = randomChoice(rng, squares);
    if (randomBit(rng)) {
      x += randomBit(rng) ? 1 : -1;
    } else {
      y += randomBit(rng) ? 1 : -1;
    }
    const key = `${x},${y}`;
    if (occupied.has(key)) continue;
    minX = Math.min(minX, x);
    maxX = Math.max(maxX, x);
    minY = Math.min(minY, y);
    maxY = Math.max(maxY, y);
    if (maxX - minX + 1 > sizeLimit || maxY - minY + 1 > sizeLimit) {
      return canonicalizePiece(squares);
    }
    squares.push([x, y]);
    occupied.add(key);
  }
}

/**
 * Near-square rectangle of `mass` cells, filled row-major
 */
export function fallbackPiece(mass: number, maxSize: number): Piece {
  const width = Math.min(maxSize, mass);
  const coords: Coord[] = [];
  for (let i = 0; i < mass; i++) {
    coords.push([i % width, Math.floor(i / width)]);
  }
  return canonicalizePiece(coords);
}

/**
 * Immutable shape cache. Build once with `PieceCatalog.build` and share the
 * instance across generation calls.
 */
export class PieceCatalog {
  private readonly byMass: ReadonlyMap<number, readonly Piece[]>;
  readonly masses: readonly number[];

  private constructor(byMass: Map<number, Piece[]>) {
    const frozen = new Map<number, readonly Piece[]>();
    for (const [mass, shapes] of byMass) {
      frozen.set(mass, Object.freeze(shapes.map((shape) => Object.freeze(shape))));
    }
    this.byMass = frozen;
    this.masses = Object.freeze([...frozen.keys()].sort((a, b) => a - b));
  }

  static build(config: Partial<CatalogConfig> = {}): PieceCatalog {
    const { maxSize, samplesPerSize, seed } = { ...DEFAULT_CONFIG.catalog, ...definedOverrides<CatalogConfig>(config) };
    const rng = createRng(seed);
    const shapes = new Map<number, Map<string, Piece>>();

    for (let sizeLimit = 1; sizeLimit <= maxSize; sizeLimit++) {
      for (let i = 0; i < samplesPerSize; i++) {
        const piece = growPiece(sizeLimit, rng);
        let bucket = shapes.get(piece.length);
        if (!bucket) {
          bucket = new Map();
          shapes.set(piece.length, bucket);
        }
        bucket.set(pieceKey(piece), piece);
      }
    }

    const byMass = new Map<number, Piece[]>();
    for (const [mass, bucket] of shapes) {
      byMass.set(mass, [...bucket.values()].sort(comparePieces));
    }

    // Every mass up to the largest observed one gets at least one shape
    const maxMass = Math.max(0, ...byMass.keys());
    for (let mass = 1; mass <= maxMass; mass++) {
      if (!byMass.get(mass)?.length) {
        byMass.set(mass, [fallbackPiece(mass, maxSize)]);
      }
    }

    return new PieceCatalog(byMass);
  }

  /** Catalog over explicit shapes, grouped by mass. */
  static fromPieces(pieces: Iterable<Piece>): PieceCatalog {
    const grouped = new Map<number, Map<string, Piece>>();
    for (const raw of pieces) {
      const piece = canonicalizePiece(raw);
      const bucket = grouped.get(piece.length) ?? new Map<string, Piece>();
      bucket.set(pieceKey(piece), piece);
      grouped.set(piece.length, bucket);
    }
    const byMass = new Map<number, Piece[]>();
    for (const [mass, bucket] of grouped) {
      byMass.set(mass, [...bucket.values()].sort(comparePieces));
    }
    return new PieceCatalog(byMass);
  }

  has(mass: number): boolean {
    return (this.byMass.get(mass)?.length ?? 0) > 0;
  }

  shapesOf(mass: number): readonly Piece[] {
    const shapes = this.byMass.get(mass);
    if (!shapes || shapes.length === 0) {
      throw new RangeError(`Catalog has no shapes of mass ${mass}`);
    }
    return shapes;
  }

  get maxMass(): number {
    return this.masses.length > 0 ? this.masses[this.masses.length - 1] : 0;
  }

  /** Total number of distinct shapes */
  get size(): number {
    let total = 0;
    for (const shapes of this.byMass.values()) total += shapes.length;
    return total;
  }
}
