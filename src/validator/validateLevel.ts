import { isCanonical, pieceDims } from '../model/piece';
import { Level, ValidationIssue, ValidationReport } from '../model/types';

export function validateLevel(level: Level): ValidationReport {
  const issues: ValidationIssue[] = [];
  const { width, height, depth } = level;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    issues.push({ level: 'error', message: 'Width and height must be positive integers' });
  }
  if (!Number.isInteger(depth) || depth < 2) {
    issues.push({ level: 'error', message: 'Depth must be an integer >= 2' });
  }
  if (level.board.length !== width) {
    issues.push({ level: 'error', message: `Board has ${level.board.length} columns, expected ${width}` });
  }
  level.board.forEach((column, x) => {
    if (column.length !== height) {
      issues.push({ level: 'error', message: `Board column ${x} has ${column.length} cells, expected ${height}` });
    }
    column.forEach((value, y) => {
      if (!Number.isInteger(value) || value < 0 || value >= depth) {
        issues.push({ level: 'error', message: `Cell ${x} ${y} value ${value} outside [0, ${depth})` });
      }
    });
  });
  if (level.pieces.length === 0) {
    issues.push({ level: 'error', message: 'Level contains no pieces' });
  }
  level.pieces.forEach((piece, i) => {
    if (!isCanonical(piece)) {
      issues.push({ level: 'error', message: `Piece ${i} is empty or not in canonical form` });
      return;
    }
    const [pw, ph] = pieceDims(piece);
    if (pw > width || ph > height) {
      issues.push({ level: 'warning', message: `Piece ${i} (${pw}x${ph}) does not fit on the ${width}x${height} board` });
    }
  });
  return { ok: !issues.some((i) => i.level === 'error'), issues };
}
