import type { BoardState } from './chessTypes';
import { castlingToFEN, placementToFEN } from './notation/fen';
import { toAlgebraic } from './square';

/**
 * Identity of a position for repetition purposes: placement, side to move,
 * castling rights and en passant target. Clocks are ignored.
 */
export function positionKey(state: BoardState): string {
  const ep = state.enPassantTarget === null ? '-' : toAlgebraic(state.enPassantTarget);
  return `${placementToFEN(state)} ${state.sideToMove} ${castlingToFEN(state.castling)} ${ep}`;
}

/** How many times `state`'s position occurs in `history`. */
export function countRepetitions(history: readonly BoardState[], state: BoardState): number {
  const target = positionKey(state);
  let count = 0;
  for (const s of history) {
    if (positionKey(s) === target) count++;
  }
  return count;
}
