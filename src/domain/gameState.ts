import type { BoardState, CastlingRights, Color, Piece, Square } from './chessTypes';
import { createStartingBoard, getPiece } from './board';
import { assertSquare } from './square';

export const STARTING_CASTLING_RIGHTS: CastlingRights = Object.freeze({
  wK: true,
  wQ: true,
  bK: true,
  bQ: true
});

export const NO_CASTLING_RIGHTS: CastlingRights = Object.freeze({
  wK: false,
  wQ: false,
  bK: false,
  bQ: false
});

export function createInitialBoardState(): BoardState {
  return {
    board: createStartingBoard(),
    sideToMove: 'w',
    castling: STARTING_CASTLING_RIGHTS,
    enPassantTarget: null,
    halfmoveClock: 0,
    fullmoveNumber: 1
  };
}

/** Piece on `square`, or null when empty. Throws `InvalidSquareError` off the board. */
export function pieceAt(state: BoardState, square: Square): Piece | null {
  return getPiece(state.board, assertSquare(square));
}

export function sideToMove(state: BoardState): Color {
  return state.sideToMove;
}
