import type { BoardState, Move, MoveFlags, Piece, PromotionType, Square } from './chessTypes';
import { NO_FLAGS, oppositeColor } from './chessTypes';
import { getPiece } from './board';
import { BISHOP_DIRS, KING_DELTAS, KNIGHT_DELTAS, QUEEN_DIRS, ROOK_DIRS, isSquareAttacked, pawnDirection } from './attack';
import type { Delta } from './attack';
import { fileOf, isOnBoard, makeSquare, rankOf } from './square';

/**
 * Pseudo-legal move generation.
 *
 * Pseudo-legal means: piece movement rules are respected, but king safety is NOT checked.
 * Castling is the exception: its "not through check" rule is checked here because it
 * is specific to castling rather than to leaving the king in check.
 */

export const PROMOTION_PIECES: readonly PromotionType[] = ['q', 'r', 'b', 'n'];

export function createMove(from: Square, to: Square, flags?: Partial<MoveFlags>, promotion?: PromotionType): Move {
  const move: Move = promotion
    ? { from, to, promotion, flags: Object.freeze({ ...NO_FLAGS, ...flags }) }
    : { from, to, flags: Object.freeze({ ...NO_FLAGS, ...flags }) };
  return Object.freeze(move);
}

function addPromotionMoves(moves: Move[], from: Square, to: Square, flags?: Partial<MoveFlags>) {
  for (const p of PROMOTION_PIECES) {
    moves.push(createMove(from, to, flags, p));
  }
}

function addPawnMoves(state: BoardState, from: Square, pawn: Piece, moves: Move[]) {
  const f = fileOf(from);
  const r = rankOf(from);
  const dir = pawnDirection(pawn.color);
  const startRank = pawn.color === 'w' ? 1 : 6;
  const promotionRank = pawn.color === 'w' ? 7 : 0;

  // Single push
  const one = makeSquare(f, r + dir);
  if (one !== null && getPiece(state.board, one) === null) {
    if (rankOf(one) === promotionRank) {
      addPromotionMoves(moves, from, one);
    } else {
      moves.push(createMove(from, one));
    }

    // Double push from starting rank (only if single push is clear)
    const two = makeSquare(f, r + dir * 2);
    if (r === startRank && two !== null && getPiece(state.board, two) === null) {
      moves.push(createMove(from, two));
    }
  }

  // Captures (diagonals)
  for (const df of [-1, 1]) {
    const cap = makeSquare(f + df, r + dir);
    if (cap === null) continue;
    const target = getPiece(state.board, cap);
    if (target && target.color !== pawn.color) {
      if (rankOf(cap) === promotionRank) {
        addPromotionMoves(moves, from, cap, { isCapture: true });
      } else {
        moves.push(createMove(from, cap, { isCapture: true }));
      }
    } else if (target === null && cap === state.enPassantTarget) {
      // The target square is only ever set behind an enemy pawn that just double-pushed.
      moves.push(createMove(from, cap, { isCapture: true, isEnPassant: true }));
    }
  }
}

function addStepMoves(state: BoardState, from: Square, mover: Piece, deltas: readonly Delta[], moves: Move[]) {
  const f = fileOf(from);
  const r = rankOf(from);
  for (const [df, dr] of deltas) {
    const nf = f + df;
    const nr = r + dr;
    if (!isOnBoard(nf, nr)) continue;
    const to = nr * 8 + nf;
    const target = getPiece(state.board, to);
    if (!target) {
      moves.push(createMove(from, to));
    } else if (target.color !== mover.color) {
      moves.push(createMove(from, to, { isCapture: true }));
    }
  }
}

function addSlidingMoves(state: BoardState, from: Square, mover: Piece, directions: readonly Delta[], moves: Move[]) {
  const f = fileOf(from);
  const r = rankOf(from);

  for (const [df, dr] of directions) {
    let nf = f + df;
    let nr = r + dr;
    while (isOnBoard(nf, nr)) {
      const to = nr * 8 + nf;
      const target = getPiece(state.board, to);
      if (!target) {
        moves.push(createMove(from, to));
      } else {
        if (target.color !== mover.color) {
          moves.push(createMove(from, to, { isCapture: true }));
        }
        break; // blocked
      }
      nf += df;
      nr += dr;
    }
  }
}

type CastleSpec = {
  side: 'k' | 'q';
  rookFile: number;
  kingToFile: number;
  /** Files that must be empty between king and rook. */
  emptyFiles: readonly number[];
  /** Files the king stands on, crosses, or lands on. */
  safeFiles: readonly number[];
};

export const CASTLES: readonly CastleSpec[] = [
  { side: 'k', rookFile: 7, kingToFile: 6, emptyFiles: [5, 6], safeFiles: [4, 5, 6] },
  { side: 'q', rookFile: 0, kingToFile: 2, emptyFiles: [1, 2, 3], safeFiles: [4, 3, 2] }
];

function addCastleMoves(state: BoardState, from: Square, king: Piece, moves: Move[]) {
  const homeRank = king.color === 'w' ? 0 : 7;
  if (from !== homeRank * 8 + 4) return;

  const enemy = oppositeColor(king.color);
  for (const castle of CASTLES) {
    const hasRight =
      king.color === 'w'
        ? castle.side === 'k'
          ? state.castling.wK
          : state.castling.wQ
        : castle.side === 'k'
          ? state.castling.bK
          : state.castling.bQ;
    if (!hasRight) continue;

    const rook = getPiece(state.board, homeRank * 8 + castle.rookFile);
    if (!rook || rook.type !== 'r' || rook.color !== king.color) continue;
    if (castle.emptyFiles.some((file) => getPiece(state.board, homeRank * 8 + file) !== null)) continue;
    if (castle.safeFiles.some((file) => isSquareAttacked(state, homeRank * 8 + file, enemy))) continue;

    moves.push(
      createMove(from, homeRank * 8 + castle.kingToFile, {
        isCastleKingside: castle.side === 'k',
        isCastleQueenside: castle.side === 'q'
      })
    );
  }
}

function addMovesFromSquare(state: BoardState, from: Square, moves: Move[]) {
  const piece = getPiece(state.board, from);
  if (!piece) return;
  if (piece.color !== state.sideToMove) return;

  switch (piece.type) {
    case 'p':
      addPawnMoves(state, from, piece, moves);
      break;
    case 'n':
      addStepMoves(state, from, piece, KNIGHT_DELTAS, moves);
      break;
    case 'b':
      addSlidingMoves(state, from, piece, BISHOP_DIRS, moves);
      break;
    case 'r':
      addSlidingMoves(state, from, piece, ROOK_DIRS, moves);
      break;
    case 'q':
      addSlidingMoves(state, from, piece, QUEEN_DIRS, moves);
      break;
    case 'k':
      addStepMoves(state, from, piece, KING_DELTAS, moves);
      addCastleMoves(state, from, piece, moves);
      break;
  }
}

function promotionRank(move: Move): number {
  return move.promotion ? PROMOTION_PIECES.indexOf(move.promotion) : -1;
}

/** Canonical order: from-square, then to-square, then promotion piece (q, r, b, n). */
export function compareMoves(a: Move, b: Move): number {
  return a.from - b.from || a.to - b.to || promotionRank(a) - promotionRank(b);
}

/**
 * Generates pseudo-legal moves for the current side to move.
 *
 * If `fromSquare` is provided, only moves from that square are generated.
 */
export function generatePseudoLegalMoves(state: BoardState, fromSquare?: Square): Move[] {
  const moves: Move[] = [];
  if (typeof fromSquare === 'number') {
    addMovesFromSquare(state, fromSquare, moves);
  } else {
    for (let sq = 0; sq < 64; sq++) {
      addMovesFromSquare(state, sq, moves);
    }
  }
  return moves.sort(compareMoves);
}
