import type { BoardState, Piece, PieceType } from '../domain';
import { pieceAt } from '../domain';
import type { GlyphSet, Orientation } from './consoleSetup';

export type RenderOptions = {
  orientation: Orientation;
  glyphs: GlyphSet;
};

// Filled glyphs for White read better on a dark terminal background.
const UNICODE_WHITE: Record<PieceType, string> = { p: '♟', b: '♝', n: '♞', r: '♜', q: '♛', k: '♚' };
const UNICODE_BLACK: Record<PieceType, string> = { p: '♙', b: '♗', n: '♘', r: '♖', q: '♕', k: '♔' };

function glyph(p: Piece | null, glyphs: GlyphSet): string {
  if (glyphs === 'ascii') {
    if (!p) return '.';
    return p.color === 'w' ? p.type.toUpperCase() : p.type;
  }
  if (!p) return '·';
  return p.color === 'w' ? UNICODE_WHITE[p.type] : UNICODE_BLACK[p.type];
}

/**
 * Fixed-width text diagram of the position:
 *
 * ```
 *   a b c d e f g h
 *  +-+-+-+-+-+-+-+-+
 * 8|r n b q k b n r|8
 * ...
 * ```
 */
export function renderBoard(state: BoardState, options: RenderOptions): string {
  const files = options.orientation === 'w' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];
  const ranks = options.orientation === 'w' ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  const labels = `  ${files.map((f) => 'abcdefgh'[f]).join(' ')}`;
  const border = ` +${'-+'.repeat(8)}`;

  const lines = [labels, border];
  for (const r of ranks) {
    const cells = files.map((f) => glyph(pieceAt(state, r * 8 + f), options.glyphs)).join(' ');
    lines.push(`${r + 1}|${cells}|${r + 1}`);
  }
  lines.push(border, labels);
  return lines.join('\n');
}
