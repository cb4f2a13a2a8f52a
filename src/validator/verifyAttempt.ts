import { applyPiece, cloneBoard, fitsOnBoard } from '../engine/board';
import { parseAttempt } from '../model/attempt';
import { LevelParseError } from '../model/errors';
import { Attempt, Level, VerifyResult } from '../model/types';

export const SOLVED_MESSAGE = 'Solved';

/**
 * Replay an attempt on a copy of the board. Bad input text throws; an illegal
 * move or a leftover non-zero cell is a failed result.
 */
export function verifyAttempt(level: Level, attempt: string | Attempt): VerifyResult {
  const moves = typeof attempt === 'string' ? parseAttempt(attempt, level.pieces.length) : attempt;
  if (moves.length !== level.pieces.length) {
    throw new LevelParseError(`Attempt has ${moves.length} moves, expected ${level.pieces.length}`);
  }

  const board = cloneBoard(level.board);
  for (let index = 0; index < moves.length; index++) {
    const [offx, offy] = moves[index];
    const piece = level.pieces[index];
    if (!Number.isInteger(offx) || !Number.isInteger(offy) || !fitsOnBoard(piece, offx, offy, level.width, level.height)) {
      return {
        solved: false,
        message: `Illegal pos ${offx} ${offy} at piece ${index}`,
        failure: { kind: 'out_of_bounds', pieceIndex: index, offset: [offx, offy] },
      };
    }
    applyPiece(board, piece, level.depth, offx, offy, 1);
  }

  for (let y = 0; y < level.height; y++) {
    for (let x = 0; x < level.width; x++) {
      if (board[x][y] !== 0) {
        return {
          solved: false,
          message: `Not solved at ${x} ${y}`,
          failure: { kind: 'residue', x, y, value: board[x][y] },
        };
      }
    }
  }
  return { solved: true, message: SOLVED_MESSAGE };
}
