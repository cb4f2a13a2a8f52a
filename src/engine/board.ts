/**
 * Modular board arithmetic shared by the generator, solver and verifier
 */

import { pieceDims } from '../model/piece';
import { Board, Level, Piece } from '../model/types';

/**
 * Remainder with the sign of the modulus; always in [0, modulus) for modulus > 0
 */
export function floorMod(value: number, modulus: number): number {
  return ((value % modulus) + modulus) % modulus;
}

export function createBoard(width: number, height: number): Board {
  return Array.from({ length: width }, () => Array<number>(height).fill(0));
}

export function cloneBoard(board: Board): Board {
  return board.map((column) => [...column]);
}

/**
 * Overlay a piece at (offx, offy), shifting every covered cell by delta mod depth.
 * The caller guarantees the piece fits.
 */
export function applyPiece(
  board: Board,
  piece: Piece,
  depth: number,
  offx: number,
  offy: number,
  delta: number
): void {
  for (const [px, py] of piece) {
    const column = board[offx + px];
    column[offy + py] = floorMod(column[offy + py] + delta, depth);
  }
}

export function isSolved(board: Board): boolean {
  return board.every((column) => column.every((value) => value === 0));
}

export function fitsOnBoard(piece: Piece, offx: number, offy: number, width: number, height: number): boolean {
  const [pw, ph] = pieceDims(piece);
  return offx >= 0 && offy >= 0 && offx + pw <= width && offy + ph <= height;
}

// ===== Flat representation (index = x + y * width) =====

/** Cell values at x + y * width, for any depth */
export type FlatBoard = Float64Array;

export function flattenBoard(level: Level): FlatBoard {
  const flat = new Float64Array(level.width * level.height);
  for (let y = 0; y < level.height; y++) {
    for (let x = 0; x < level.width; x++) {
      flat[x + y * level.width] = level.board[x][y];
    }
  }
  return flat;
}

export function applyDeltaFlat(flat: FlatBoard, indices: readonly number[], depth: number, delta: number): void {
  for (const idx of indices) {
    flat[idx] = floorMod(flat[idx] + delta, depth);
  }
}

export function isFlatSolved(flat: FlatBoard): boolean {
  return flat.every((value) => value === 0);
}
