/**
 * Core chess domain types.
 *
 * Keep these types UI-agnostic and JSON-serializable.
 */

/** Color: white ('w') or black ('b'). */
export type Color = 'w' | 'b';

/**
 * Piece types are stored in lowercase, similar to FEN, but without color.
 * - p pawn
 * - n knight
 * - b bishop
 * - r rook
 * - q queen
 * - k king
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export type PromotionType = Exclude<PieceType, 'k' | 'p'>;

export type Piece = {
  readonly color: Color;
  readonly type: PieceType;
};

/**
 * 0–63 square index.
 *
 * Convention:
 * - 0 = a1
 * - 7 = h1
 * - 8 = a2
 * - 63 = h8
 */
export type Square = number;

export type CastlingRights = {
  /** White king-side (K). */
  readonly wK: boolean;
  /** White queen-side (Q). */
  readonly wQ: boolean;
  /** Black king-side (k). */
  readonly bK: boolean;
  /** Black queen-side (q). */
  readonly bQ: boolean;
};

export type MoveFlags = {
  readonly isCapture: boolean;
  readonly isEnPassant: boolean;
  readonly isCastleKingside: boolean;
  readonly isCastleQueenside: boolean;
};

/**
 * A fully described move, as produced by move generation.
 * Instances are frozen.
 */
export type Move = {
  readonly from: Square;
  readonly to: Square;
  /** Promotion piece type when the move promotes a pawn. */
  readonly promotion?: PromotionType;
  readonly flags: MoveFlags;
};

/**
 * What a caller asks for. Flags are a function of the position, so they are
 * looked up rather than trusted.
 */
export type MoveRequest = Pick<Move, 'from' | 'to' | 'promotion'>;

export type Board = ReadonlyArray<Piece | null>;

export type BoardState = {
  readonly board: Board;
  readonly sideToMove: Color;
  readonly castling: CastlingRights;
  /** En passant target square, or null if none. */
  readonly enPassantTarget: Square | null;
  /** Halfmove clock for the 50-move rule. */
  readonly halfmoveClock: number;
  /** Fullmove number (starts at 1). */
  readonly fullmoveNumber: number;
};

export type DrawReason = 'fiftyMove' | 'repetition' | 'insufficientMaterial';

export type GameStatus =
  | { kind: 'inProgress' }
  | { kind: 'checkmate'; winner: Color }
  | { kind: 'stalemate' }
  | { kind: 'draw'; reason: DrawReason };

export function oppositeColor(c: Color): Color {
  return c === 'w' ? 'b' : 'w';
}

export const NO_FLAGS: MoveFlags = Object.freeze({
  isCapture: false,
  isEnPassant: false,
  isCastleKingside: false,
  isCastleQueenside: false
});

export function isCastle(move: Move): boolean {
  return move.flags.isCastleKingside || move.flags.isCastleQueenside;
}
