import type { Board, BoardState, Color, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { findPieces, getPiece } from './board';
import { fileOf, isOnBoard, rankOf } from './square';

export type Delta = readonly [number, number];

export const KNIGHT_DELTAS: readonly Delta[] = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2]
];

export const KING_DELTAS: readonly Delta[] = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1]
];

export const ROOK_DIRS: readonly Delta[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
];

export const BISHOP_DIRS: readonly Delta[] = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1]
];

export const QUEEN_DIRS: readonly Delta[] = [...ROOK_DIRS, ...BISHOP_DIRS];

/** Forward rank direction of a pawn of `color`. */
export function pawnDirection(color: Color): 1 | -1 {
  return color === 'w' ? 1 : -1;
}

function stepTargets(from: Square, deltas: readonly Delta[]): Square[] {
  const f = fileOf(from);
  const r = rankOf(from);
  const out: Square[] = [];
  for (const [df, dr] of deltas) {
    const nf = f + df;
    const nr = r + dr;
    if (isOnBoard(nf, nr)) out.push(nr * 8 + nf);
  }
  return out;
}

/** Walks each ray until the edge or the first occupied square (inclusive). */
function rayTargets(board: Board, from: Square, directions: readonly Delta[]): Square[] {
  const out: Square[] = [];
  for (const [df, dr] of directions) {
    let nf = fileOf(from) + df;
    let nr = rankOf(from) + dr;
    while (isOnBoard(nf, nr)) {
      const to = nr * 8 + nf;
      out.push(to);
      if (getPiece(board, to)) break;
      nf += df;
      nr += dr;
    }
  }
  return out;
}

/**
 * Squares attacked by the piece standing on `from`, regardless of what occupies them.
 *
 * Pawns attack their two forward diagonals only; pushes and castling never
 * attack anything. This is the only primitive check detection is built on, so it
 * must stay independent of move generation and legality filtering.
 */
export function pieceAttacks(board: Board, from: Square): Square[] {
  const p = getPiece(board, from);
  if (!p) return [];

  switch (p.type) {
    case 'p': {
      const dr = pawnDirection(p.color);
      return stepTargets(from, [
        [-1, dr],
        [1, dr]
      ]);
    }
    case 'n':
      return stepTargets(from, KNIGHT_DELTAS);
    case 'k':
      return stepTargets(from, KING_DELTAS);
    case 'b':
      return rayTargets(board, from, BISHOP_DIRS);
    case 'r':
      return rayTargets(board, from, ROOK_DIRS);
    case 'q':
      return rayTargets(board, from, QUEEN_DIRS);
  }
}

/**
 * Returns true if `square` is attacked by any piece of `byColor`.
 *
 * Purely geometric: pins and the attacker's own king safety are ignored, and
 * an en passant target is not treated as attacked.
 */
export function isSquareAttacked(state: BoardState, square: Square, byColor: Color): boolean {
  const board = state.board;
  for (let from = 0; from < 64; from++) {
    const p = board[from];
    if (!p || p.color !== byColor) continue;
    if (pieceAttacks(board, from).includes(square)) return true;
  }
  return false;
}

export function findKing(state: BoardState, color: Color): Square | null {
  const kings = findPieces(state.board, color, 'k');
  return kings.length > 0 ? kings[0] : null;
}

export function isInCheck(state: BoardState, color: Color): boolean {
  const kingSq = findKing(state, color);
  if (kingSq === null) return false; // should not happen in valid positions
  return isSquareAttacked(state, kingSq, oppositeColor(color));
}
