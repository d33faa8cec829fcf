import type { BoardState, CastlingRights, Color, Piece } from '../chessTypes';
import { oppositeColor } from '../chessTypes';
import { piece } from '../board';
import { isInCheck } from '../attack';
import { InvalidFenError } from '../errors';
import { parseAlgebraicSquare, rankOf, toAlgebraic } from '../square';

export type FenParseResult =
  | { ok: true; value: BoardState }
  | { ok: false; error: string };

export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

function pieceToFenChar(p: Piece): string {
  const c = p.type;
  return p.color === 'w' ? c.toUpperCase() : c;
}

/** Piece placement field only (rank 8 first). */
export function placementToFEN(state: BoardState): string {
  const ranks: string[] = [];

  for (let r = 7; r >= 0; r--) {
    let empty = 0;
    let out = '';
    for (let f = 0; f < 8; f++) {
      const p = state.board[r * 8 + f];
      if (!p) {
        empty++;
      } else {
        if (empty > 0) {
          out += String(empty);
          empty = 0;
        }
        out += pieceToFenChar(p);
      }
    }
    if (empty > 0) out += String(empty);
    ranks.push(out);
  }

  return ranks.join('/');
}

export function castlingToFEN(c: CastlingRights): string {
  let castling = '';
  if (c.wK) castling += 'K';
  if (c.wQ) castling += 'Q';
  if (c.bK) castling += 'k';
  if (c.bQ) castling += 'q';
  return castling === '' ? '-' : castling;
}

/** Convert a BoardState to a FEN string. */
export function toFEN(state: BoardState): string {
  const ep = state.enPassantTarget === null ? '-' : toAlgebraic(state.enPassantTarget);
  return `${placementToFEN(state)} ${state.sideToMove} ${castlingToFEN(state.castling)} ${ep} ${state.halfmoveClock} ${state.fullmoveNumber}`;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function fenCharToPiece(ch: string): Piece | null {
  const lower = ch.toLowerCase();
  const color: Color = ch === lower ? 'b' : 'w';
  switch (lower) {
    case 'p':
    case 'n':
    case 'b':
    case 'r':
    case 'q':
    case 'k':
      return piece(color, lower);
    default:
      return null;
  }
}

function parseCounter(text: string): number | null {
  if (!/^[0-9]+$/.test(text)) return null;
  return Number(text);
}

/**
 * Parse a FEN string into a BoardState.
 *
 * Missing trailing fields default to `- - 0 1`. Positions that could not arise
 * in play are rejected: missing or extra kings, pawns on a back rank, an en
 * passant target without the pawn that just passed it, or the side not to move
 * left in check.
 */
export function tryParseFEN(fen: string): FenParseResult {
  if (fen.trim().length === 0) return { ok: false, error: 'FEN must be a non-empty string' };

  const parts = fen.trim().split(/\s+/);
  if (parts.length < 2) return { ok: false, error: 'FEN must have at least 2 fields (placement + active color)' };
  if (parts.length > 6) return { ok: false, error: 'FEN has more than 6 fields' };

  const [placement, active, castlingStr = '-', epStr = '-', halfStr = '0', fullStr = '1'] = parts;

  if (active !== 'w' && active !== 'b') return { ok: false, error: 'FEN active color must be "w" or "b"' };

  const ranks = placement.split('/');
  if (ranks.length !== 8) return { ok: false, error: 'FEN placement must have 8 ranks' };

  const board: Array<Piece | null> = new Array<Piece | null>(64).fill(null);
  // FEN ranks go from 8 to 1; our squares are a1=0 .. h8=63.
  for (let r = 0; r < 8; r++) {
    const fenRank = ranks[r];
    let file = 0;
    for (const ch of fenRank) {
      if (isDigit(ch)) {
        const n = Number(ch);
        if (n < 1 || n > 8) return { ok: false, error: `Invalid digit in rank ${8 - r}` };
        file += n;
        if (file > 8) return { ok: false, error: `Too many squares in rank ${8 - r}` };
        continue;
      }

      const p = fenCharToPiece(ch);
      if (!p) return { ok: false, error: `Invalid piece char "${ch}" in rank ${8 - r}` };
      if (file >= 8) return { ok: false, error: `Too many squares in rank ${8 - r}` };
      board[(7 - r) * 8 + file] = p;
      file++;
    }
    if (file !== 8) return { ok: false, error: `Rank ${8 - r} does not have 8 files` };
  }

  for (const color of ['w', 'b'] as const) {
    const kings = board.filter((p) => p !== null && p.color === color && p.type === 'k').length;
    if (kings !== 1) return { ok: false, error: `Expected exactly one ${color === 'w' ? 'white' : 'black'} king, found ${kings}` };
  }
  if (board.some((p, sq) => p !== null && p.type === 'p' && (rankOf(sq) === 0 || rankOf(sq) === 7))) {
    return { ok: false, error: 'Pawns cannot stand on the first or last rank' };
  }

  // Castling
  const castling = { wK: false, wQ: false, bK: false, bQ: false };
  if (castlingStr !== '-') {
    for (const ch of castlingStr) {
      if (ch === 'K') castling.wK = true;
      else if (ch === 'Q') castling.wQ = true;
      else if (ch === 'k') castling.bK = true;
      else if (ch === 'q') castling.bQ = true;
      else return { ok: false, error: `Invalid castling rights "${castlingStr}"` };
    }
  }

  // En passant
  let enPassantTarget: BoardState['enPassantTarget'] = null;
  if (epStr !== '-') {
    const sq = parseAlgebraicSquare(epStr);
    const expectedRank = active === 'w' ? 5 : 2;
    if (sq === null || rankOf(sq) !== expectedRank) return { ok: false, error: `Invalid en passant target "${epStr}"` };

    // The pawn that moved two squares stands in front of the target and came from behind it.
    const forward = active === 'w' ? -8 : 8;
    const pushed = board[sq + forward];
    if (!pushed || pushed.type !== 'p' || pushed.color === active) {
      return { ok: false, error: `No pawn can be captured en passant on "${epStr}"` };
    }
    if (board[sq] !== null || board[sq - forward] !== null) {
      return { ok: false, error: `En passant target "${epStr}" and the square behind it must be empty` };
    }
    enPassantTarget = sq;
  }

  const halfmoveClock = parseCounter(halfStr);
  const fullmoveNumber = parseCounter(fullStr);
  if (halfmoveClock === null) return { ok: false, error: 'Invalid halfmove clock' };
  if (fullmoveNumber === null || fullmoveNumber < 1) return { ok: false, error: 'Invalid fullmove number' };

  const state: BoardState = {
    board,
    sideToMove: active,
    castling: Object.freeze(castling),
    enPassantTarget,
    halfmoveClock,
    fullmoveNumber
  };
  if (isInCheck(state, oppositeColor(active))) {
    return { ok: false, error: `${active === 'w' ? 'Black' : 'White'} is in check but it is not their move` };
  }

  return { ok: true, value: state };
}

export function fromFEN(fen: string): BoardState {
  const r = tryParseFEN(fen);
  if (!r.ok) throw new InvalidFenError(r.error);
  return r.value;
}
