import type { BoardState, Move, PieceType } from '../chessTypes';
import { isCastle, oppositeColor } from '../chessTypes';
import { getPiece } from '../board';
import { fileOf, rankOf, toAlgebraic } from '../square';
import { generateLegalMoves } from '../legalMoves';
import { makeMove } from '../makeMove';
import { isInCheck } from '../attack';

const PIECE_LETTERS: Record<PieceType, string> = {
  p: '',
  n: 'N',
  b: 'B',
  r: 'R',
  q: 'Q',
  k: 'K'
};

function disambiguation(prev: BoardState, move: Move, movingType: PieceType): string {
  if (movingType === 'p' || movingType === 'k') return '';

  const contenders = generateLegalMoves(prev).filter((m) => {
    if (m.to !== move.to || m.from === move.from) return false;
    return getPiece(prev.board, m.from)?.type === movingType;
  });

  if (contenders.length === 0) return '';

  const from = toAlgebraic(move.from);
  if (!contenders.some((m) => fileOf(m.from) === fileOf(move.from))) return from[0]; // file only
  if (!contenders.some((m) => rankOf(m.from) === rankOf(move.from))) return from[1]; // rank only
  return from; // file+rank
}

function promotionSuffix(move: Move): string {
  return move.promotion ? `=${move.promotion.toUpperCase()}` : '';
}

function checkSuffix(prev: BoardState, move: Move): string {
  const next = makeMove(prev, move);
  if (!isInCheck(next, oppositeColor(prev.sideToMove))) return '';
  return generateLegalMoves(next).length === 0 ? '#' : '+';
}

/**
 * Convert a legal move to SAN (Standard Algebraic Notation) based on the position BEFORE the move.
 *
 * Annotations like "!" / "?" are never produced.
 */
export function toSAN(prev: BoardState, move: Move): string {
  const moving = getPiece(prev.board, move.from);
  if (!moving) {
    // Fallback: coordinate notation
    return `${toAlgebraic(move.from)}${toAlgebraic(move.to)}${promotionSuffix(move)}`;
  }

  if (isCastle(move)) {
    return `${move.flags.isCastleKingside ? 'O-O' : 'O-O-O'}${checkSuffix(prev, move)}`;
  }

  const dest = toAlgebraic(move.to);
  const x = move.flags.isCapture ? 'x' : '';

  if (moving.type === 'p') {
    const core = move.flags.isCapture ? `${toAlgebraic(move.from)[0]}x${dest}` : dest;
    return `${core}${promotionSuffix(move)}${checkSuffix(prev, move)}`;
  }

  const dis = disambiguation(prev, move, moving.type);
  return `${PIECE_LETTERS[moving.type]}${dis}${x}${dest}${checkSuffix(prev, move)}`;
}
