/**
 * Plain-text and ANSI rendering of levels for the terminal
 */

import { pieceToString } from '../model/piece';
import { Level, Piece } from '../model/types';

/** 256-colour background per cell value */
const VALUE_COLORS: Record<number, number> = {
  0: 240, // gray
  1: 45, // cyan
  2: 214, // orange
  3: 199, // magenta
  4: 118, // green
};

const FALLBACK_COLOR = 250;

export function colorCell(value: number): string {
  const color = VALUE_COLORS[value] ?? FALLBACK_COLOR;
  return `\x1b[48;5;${color}m ${value} \x1b[0m`;
}

export function plainCell(value: number): string {
  return ` ${value} `;
}

export function renderBoard(level: Level, useColor: boolean): string {
  const cell = useColor ? colorCell : plainCell;
  const lines: string[] = [];
  for (let y = 0; y < level.height; y++) {
    let row = '';
    for (let x = 0; x < level.width; x++) {
      row += cell(level.board[x][y]);
    }
    lines.push(row);
  }
  return lines.join('\n');
}

export function renderPiece(piece: Piece): string {
  return pieceToString(piece).replace(/,/g, '\n');
}

export function levelHeader(level: Level): string {
  const id = level.level !== undefined ? String(level.level) : '?';
  return `Modulo level ${id} (${level.width}x${level.height}, depth=${level.depth}, pieces=${level.pieces.length})`;
}

export function renderLevel(level: Level, options: { useColor: boolean; showPieces: boolean }): string {
  const parts = [levelHeader(level), renderBoard(level, options.useColor)];
  if (options.showPieces) {
    parts.push('', 'Pieces:');
    level.pieces.forEach((piece, idx) => {
      parts.push(`[${idx}]`, renderPiece(piece), '');
    });
  }
  return parts.join('\n');
}
