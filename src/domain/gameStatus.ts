import type { BoardState, DrawReason, GameStatus, Piece, Square } from './chessTypes';
import { oppositeColor } from './chessTypes';
import { isLightSquare } from './square';
import { generateLegalMoves } from './legalMoves';
import { isInCheck } from './attack';
import { countRepetitions } from './repetition';

/** 50 moves by each side without a pawn move or capture. */
export const FIFTY_MOVE_HALFMOVES = 100;

export const REPETITION_LIMIT = 3;

/**
 * Dead positions by material alone:
 * K vs K, K+N vs K, K+B vs K, and K+B vs K+B with both bishops on one square color.
 */
export function isInsufficientMaterial(state: BoardState): boolean {
  const nonKingPieces: Array<{ piece: Piece; square: Square }> = [];
  for (let i = 0; i < 64; i++) {
    const p = state.board[i];
    if (!p) continue;
    if (p.type === 'k') continue;
    nonKingPieces.push({ piece: p, square: i });
  }

  if (nonKingPieces.length === 0) return true; // K vs K

  // Any pawns, rooks, or queens mean sufficient material.
  if (nonKingPieces.some(({ piece }) => piece.type === 'p' || piece.type === 'r' || piece.type === 'q')) {
    return false;
  }

  if (nonKingPieces.length === 1) return true; // single minor piece

  if (nonKingPieces.length === 2) {
    const [a, b] = nonKingPieces;
    if (a.piece.type === 'b' && b.piece.type === 'b' && a.piece.color !== b.piece.color) {
      return isLightSquare(a.square) === isLightSquare(b.square);
    }
  }

  return false;
}

/**
 * Status of `state`, given the positions that led to it.
 *
 * `history` must include `state` itself as its last element; it defaults to
 * just `state`, which disables repetition detection. Checks run in a fixed
 * order: mate/stalemate, fifty-move rule, repetition, insufficient material.
 */
export function getGameStatus(state: BoardState, history: readonly BoardState[] = [state]): GameStatus {
  if (generateLegalMoves(state).length === 0) {
    const stm = state.sideToMove;
    return isInCheck(state, stm) ? { kind: 'checkmate', winner: oppositeColor(stm) } : { kind: 'stalemate' };
  }

  if (state.halfmoveClock >= FIFTY_MOVE_HALFMOVES) return { kind: 'draw', reason: 'fiftyMove' };
  if (countRepetitions(history, state) >= REPETITION_LIMIT) return { kind: 'draw', reason: 'repetition' };
  if (isInsufficientMaterial(state)) return { kind: 'draw', reason: 'insufficientMaterial' };

  return { kind: 'inProgress' };
}

export function isTerminal(status: GameStatus): boolean {
  return status.kind !== 'inProgress';
}

const DRAW_LABELS: Record<DrawReason, string> = {
  fiftyMove: 'Draw by the fifty-move rule',
  repetition: 'Draw by threefold repetition',
  insufficientMaterial: 'Draw by insufficient material'
};

export function describeStatus(status: GameStatus): string {
  switch (status.kind) {
    case 'inProgress':
      return 'In progress';
    case 'checkmate':
      return `Checkmate, ${status.winner === 'w' ? 'White' : 'Black'} wins`;
    case 'stalemate':
      return 'Draw by stalemate';
    case 'draw':
      return DRAW_LABELS[status.reason];
  }
}
