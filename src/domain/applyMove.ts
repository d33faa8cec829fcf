import type { BoardState, Move, MoveRequest } from './chessTypes';
import { IllegalMoveError } from './errors';
import { findLegalMove } from './legalMoves';
import { makeMove } from './makeMove';

export type AppliedMove = {
  /** The legal move the request resolved to, flags included. */
  move: Move;
  next: BoardState;
};

/**
 * Resolve `request` against `generateLegalMoves(state)` and play it.
 *
 * This is the single enforcement point: anything outside the legal set throws
 * `IllegalMoveError`. `state` is never modified, whether the move is accepted or not.
 */
export function applyLegalMove(state: BoardState, request: MoveRequest): AppliedMove {
  const move = findLegalMove(state, request);
  if (!move) throw new IllegalMoveError(request, state.sideToMove);
  return { move, next: makeMove(state, move) };
}

/** Apply a move and return the next state. */
export function applyMove(state: BoardState, request: MoveRequest): BoardState {
  return applyLegalMove(state, request).next;
}
