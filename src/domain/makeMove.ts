import type { Board, BoardState, CastlingRights, Color, Move, Piece, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { getPiece, piece, setPiece } from './board';
import { fileOf, rankOf } from './square';

/**
 * Unchecked state transition.
 *
 * The move is assumed to come from move generation for `state`; nothing is
 * validated. Callers outside the rules core should use `applyMove`.
 */

function withoutColorRights(c: CastlingRights, color: Color): CastlingRights {
  return color === 'w' ? { ...c, wK: false, wQ: false } : { ...c, bK: false, bQ: false };
}

/** Rights tied to a rook corner are lost when anything leaves or lands on that corner. */
function withoutCornerRights(c: CastlingRights, square: Square): CastlingRights {
  switch (square) {
    case 0:
      return { ...c, wQ: false };
    case 7:
      return { ...c, wK: false };
    case 56:
      return { ...c, bQ: false };
    case 63:
      return { ...c, bK: false };
    default:
      return c;
  }
}

function nextCastlingRights(state: BoardState, move: Move, moving: Piece): CastlingRights {
  let next = state.castling;
  if (moving.type === 'k') next = withoutColorRights(next, moving.color);
  next = withoutCornerRights(next, move.from);
  next = withoutCornerRights(next, move.to);
  if (next.wK === state.castling.wK && next.wQ === state.castling.wQ && next.bK === state.castling.bK && next.bQ === state.castling.bQ) {
    return state.castling;
  }
  return Object.freeze(next);
}

function doublePushTarget(moving: Piece, from: Square, to: Square): Square | null {
  if (moving.type !== 'p') return null;
  if (Math.abs(rankOf(to) - rankOf(from)) !== 2) return null;
  return (from + to) / 2;
}

function moveRookForCastle(board: Board, move: Move, color: Color): Board {
  const homeRank = color === 'w' ? 0 : 7;
  const [rookFromFile, rookToFile] = move.flags.isCastleKingside ? [7, 5] : [0, 3];
  const rookFrom = homeRank * 8 + rookFromFile;
  const rook = getPiece(board, rookFrom);
  const cleared = setPiece(board, rookFrom, null);
  return rook ? setPiece(cleared, homeRank * 8 + rookToFile, rook) : cleared;
}

export function makeMove(state: BoardState, move: Move): BoardState {
  const moving = getPiece(state.board, move.from);
  if (!moving) return state;

  let board = setPiece(state.board, move.from, null);

  if (move.flags.isEnPassant) {
    // Captured pawn sits beside the mover, on the target square's file.
    board = setPiece(board, rankOf(move.from) * 8 + fileOf(move.to), null);
  }

  board = setPiece(board, move.to, move.promotion ? piece(moving.color, move.promotion) : moving);

  if (move.flags.isCastleKingside || move.flags.isCastleQueenside) {
    board = moveRookForCastle(board, move, moving.color);
  }

  const resetsClock = moving.type === 'p' || move.flags.isCapture;

  return {
    board,
    sideToMove: oppositeColor(state.sideToMove),
    castling: nextCastlingRights(state, move, moving),
    enPassantTarget: doublePushTarget(moving, move.from, move.to),
    halfmoveClock: resetsClock ? 0 : state.halfmoveClock + 1,
    // Fullmove number increments after black moves.
    fullmoveNumber: state.sideToMove === 'b' ? state.fullmoveNumber + 1 : state.fullmoveNumber
  };
}
