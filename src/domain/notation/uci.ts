import type { MoveRequest, PromotionType } from '../chessTypes';
import { parseAlgebraicSquare, toAlgebraic } from '../square';

/**
 * UCI move notation helpers.
 *
 * Examples:
 * - e2e4
 * - e7e8q (promotion)
 */

export function moveToUci(move: MoveRequest): string {
  const from = toAlgebraic(move.from);
  const to = toAlgebraic(move.to);
  return `${from}${to}${move.promotion ?? ''}`;
}

function parsePromotion(ch: string): PromotionType | null {
  return ch === 'q' || ch === 'r' || ch === 'b' || ch === 'n' ? ch : null;
}

export function parseUciMove(text: string): MoveRequest | null {
  const t = text.trim().toLowerCase();
  if (t.length !== 4 && t.length !== 5) return null;

  const from = parseAlgebraicSquare(t.slice(0, 2));
  const to = parseAlgebraicSquare(t.slice(2, 4));
  if (from === null || to === null) return null;

  if (t.length === 4) return { from, to };

  const promotion = parsePromotion(t[4]);
  return promotion ? { from, to, promotion } : null;
}
