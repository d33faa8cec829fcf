import type { BoardState, Color, Move, MoveRequest, Square } from './chessTypes';
import { isCastle, oppositeColor } from './chessTypes';
import { isInCheck, isSquareAttacked } from './attack';
import { makeMove } from './makeMove';
import { generatePseudoLegalMoves } from './movegen';
import { fileOf } from './square';

function castlePathSquares(from: Square, to: Square): Square[] {
  // e1->g1 crosses f1, e1->c1 crosses d1; the destination is included.
  const dir = Math.sign(fileOf(to) - fileOf(from));
  const squares: Square[] = [];
  for (let sq = from + dir; sq !== to + dir; sq += dir) {
    squares.push(sq);
  }
  return squares;
}

function isCastleLegal(state: BoardState, move: Move): boolean {
  const color = state.sideToMove;
  const enemy: Color = oppositeColor(color);

  // King cannot castle out of check.
  if (isInCheck(state, color)) return false;

  // King cannot pass through or land on attacked squares.
  return castlePathSquares(move.from, move.to).every((sq) => !isSquareAttacked(state, sq, enemy));
}

/**
 * Legal move generation.
 *
 * Filters pseudo-legal moves by king safety:
 * - a move is legal if after making it, your king is not in check.
 * - castling additionally requires not being in check and not passing through check.
 *   Move generation already checks this; it is repeated so this filter holds on its own.
 */
export function generateLegalMoves(state: BoardState, fromSquare?: Square): Move[] {
  const color = state.sideToMove;
  return generatePseudoLegalMoves(state, fromSquare).filter((m) => {
    if (isCastle(m) && !isCastleLegal(state, m)) return false;
    // next.sideToMove is flipped, so check the original mover's king.
    return !isInCheck(makeMove(state, m), color);
  });
}

export function sameMove(a: MoveRequest, b: MoveRequest): boolean {
  return a.from === b.from && a.to === b.to && (a.promotion ?? null) === (b.promotion ?? null);
}

/** The legal move matching `request` (from, to, promotion), or null. */
export function findLegalMove(state: BoardState, request: MoveRequest): Move | null {
  if (!Number.isInteger(request.from) || request.from < 0 || request.from > 63) return null;
  return generateLegalMoves(state, request.from).find((m) => sameMove(m, request)) ?? null;
}

export function isLegalMove(state: BoardState, request: MoveRequest): boolean {
  return findLegalMove(state, request) !== null;
}
