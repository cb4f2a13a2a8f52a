/**
 * Attempt codec: one 4-hex-character chunk per piece, `xx` then `yy`
 */

import { EncodingError, LevelParseError } from './errors';
import { Attempt, Move } from './types';

export const MAX_OFFSET = 0xff;

const CHUNK_PATTERN = /^[0-9a-fA-F]{4}$/;

export function parseAttempt(text: string, pieceCount: number): Attempt {
  const cleaned = text.replace(/\s+/g, '');
  const expectedLength = pieceCount * 4;
  if (cleaned.length !== expectedLength) {
    throw new LevelParseError(`Attempt length must be exactly ${expectedLength} hex chars (4 per piece).`);
  }
  const moves: Attempt = [];
  for (let i = 0; i < cleaned.length; i += 4) {
    const chunk = cleaned.slice(i, i + 4);
    if (!CHUNK_PATTERN.test(chunk)) {
      throw new LevelParseError(`Invalid hex in attempt at offset ${i}: '${chunk}'`);
    }
    moves.push([parseInt(chunk.slice(0, 2), 16), parseInt(chunk.slice(2), 16)]);
  }
  return moves;
}

function toHexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

export function encodeAttempt(moves: readonly Move[]): string {
  return moves
    .map(([x, y]) => {
      if (!isEncodable(x) || !isEncodable(y)) {
        throw new EncodingError(`Move out of range for hex encoding: (${x}, ${y})`);
      }
      return `${toHexByte(x)}${toHexByte(y)}`;
    })
    .join('');
}

function isEncodable(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_OFFSET;
}
