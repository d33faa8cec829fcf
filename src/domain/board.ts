import type { Board, Color, Piece, PieceType, Square } from './chessTypes';
import { squareAt } from './square';

export function createEmptyBoard(): Board {
  return Array.from({ length: 64 }, () => null);
}

export function getPiece(board: Board, square: Square): Piece | null {
  return board[square] ?? null;
}

/** Copy-on-write: returns a new board, `board` is untouched. */
export function setPiece(board: Board, square: Square, piece: Piece | null): Board {
  const next = board.slice();
  next[square] = piece;
  return next;
}

export function piece(color: Color, type: PieceType): Piece {
  return Object.freeze({ color, type });
}

const BACK_RANK: readonly PieceType[] = ['r', 'n', 'b', 'q', 'k', 'b', 'n', 'r'];

/**
 * Standard chess starting position.
 *
 * Board convention is 0=a1..63=h8.
 */
export function createStartingBoard(): Board {
  const b: Array<Piece | null> = createEmptyBoard().slice();

  for (let file = 0; file < 8; file++) {
    b[squareAt(file, 0)] = piece('w', BACK_RANK[file]);
    b[squareAt(file, 1)] = piece('w', 'p');
    b[squareAt(file, 6)] = piece('b', 'p');
    b[squareAt(file, 7)] = piece('b', BACK_RANK[file]);
  }

  return b;
}

export function countPieces(board: Board): number {
  let n = 0;
  for (const sq of board) {
    if (sq) n++;
  }
  return n;
}

export function findPieces(board: Board, color: Color, type: PieceType): Square[] {
  const out: Square[] = [];
  for (let sq = 0; sq < 64; sq++) {
    const p = board[sq];
    if (p && p.color === color && p.type === type) out.push(sq);
  }
  return out;
}
