import { pieceDims } from '../model/piece';
import { Level, Piece, Placement } from '../model/types';

/**
 * Every in-bounds offset for a piece, row-major (x fastest), with the flat
 * cell indices it covers
 */
export function placementsForPiece(level: Level, piece: Piece): Placement[] {
  const [pw, ph] = pieceDims(piece);
  const placements: Placement[] = [];
  for (let offy = 0; offy <= level.height - ph; offy++) {
    for (let offx = 0; offx <= level.width - pw; offx++) {
      const cells = piece.map(([px, py]) => offx + px + (offy + py) * level.width);
      placements.push({ offx, offy, cells });
    }
  }
  return placements;
}

export function placementsForLevel(level: Level): Placement[][] {
  return level.pieces.map((piece) => placementsForPiece(level, piece));
}

/**
 * Reason to skip the search, or null when it should run
 */
export function bailOutReason(
  level: Level,
  placements: Placement[][],
  maxPlacements: number,
  maxAreaForFullSearch: number
): string | null {
  const empty = placements.findIndex((options) => options.length === 0);
  if (empty !== -1) {
    return `Piece ${empty} has no valid placement`;
  }
  const total = placements.reduce((sum, options) => sum + options.length, 0);
  const area = level.width * level.height;
  if (total > maxPlacements && area > maxAreaForFullSearch) {
    return `Search space too large (${total} placements on ${area} cells)`;
  }
  return null;
}
