import type { BoardState, Move } from '../chessTypes';
import { findLegalMove, generateLegalMoves } from '../legalMoves';
import { moveToUci, parseUciMove } from './uci';
import { toSAN } from './san';

export type MoveParseResult =
  | { ok: true; value: Move }
  | { ok: false; error: string };

/** Strips check marks, annotations and alternative castling spellings. */
export function normalizeSanToken(tok: string): string {
  let t = tok.trim();
  t = t.replace(/^0-0-0/, 'O-O-O').replace(/^0-0/, 'O-O');
  t = t.replace(/[!?]+$/g, '');
  t = t.replace(/\s*e\.p\.?$/i, '');
  t = t.replace(/[+#]$/, '');
  return t;
}

/**
 * Resolve user text (UCI like `e2e4` / `e7e8q`, or SAN like `Nf3`, `exd5`, `O-O`)
 * to one of the legal moves of `state`.
 */
export function parseMove(text: string, state: BoardState): MoveParseResult {
  const raw = text.trim();
  if (raw.length === 0) return { ok: false, error: 'Empty move' };

  const uci = parseUciMove(raw);
  if (uci) {
    const move = findLegalMove(state, uci);
    if (!move) return { ok: false, error: `Illegal move: ${moveToUci(uci)}` };
    return { ok: true, value: move };
  }

  const wanted = normalizeSanToken(raw);
  const matches = generateLegalMoves(state).filter((m) => normalizeSanToken(toSAN(state, m)) === wanted);

  if (matches.length === 1) return { ok: true, value: matches[0] };
  if (matches.length > 1) return { ok: false, error: `Ambiguous move: ${raw}` };
  return { ok: false, error: `Illegal or unrecognized move: ${raw}` };
}
