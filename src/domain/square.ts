import type { Square } from './chessTypes';
import { InvalidSquareError } from './errors';

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;
export const RANKS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export function isSquare(x: unknown): x is Square {
  return typeof x === 'number' && Number.isInteger(x) && x >= 0 && x < 64;
}

export function fileOf(square: Square): number {
  return square % 8;
}

export function rankOf(square: Square): number {
  return Math.floor(square / 8);
}

export function isOnBoard(file: number, rank: number): boolean {
  return file >= 0 && file < 8 && rank >= 0 && rank < 8;
}

export function makeSquare(file: number, rank: number): Square | null {
  if (!Number.isInteger(file) || !Number.isInteger(rank)) return null;
  if (!isOnBoard(file, rank)) return null;
  return rank * 8 + file;
}

/** Like `makeSquare`, but throws `InvalidSquareError` instead of returning null. */
export function squareAt(file: number, rank: number): Square {
  const sq = makeSquare(file, rank);
  if (sq === null) throw new InvalidSquareError(`file=${file}, rank=${rank}`);
  return sq;
}

export function assertSquare(value: unknown): Square {
  if (!isSquare(value)) throw new InvalidSquareError(value);
  return value;
}

export function toAlgebraic(square: Square): string {
  const f = FILES[fileOf(assertSquare(square))];
  const r = (rankOf(square) + 1).toString();
  return `${f}${r}`;
}

export function parseAlgebraicSquare(text: string): Square | null {
  const t = text.trim().toLowerCase();
  if (t.length !== 2) return null;

  const f = 'abcdefgh'.indexOf(t[0]);
  const r = Number(t[1]);
  if (f < 0) return null;
  if (!Number.isInteger(r) || r < 1 || r > 8) return null;
  return makeSquare(f, r - 1);
}

/**
 * Mirrors a square vertically (rank flip).
 * Used when rendering with Black at the bottom.
 */
export function mirrorRank(square: Square): Square {
  return (7 - rankOf(square)) * 8 + fileOf(square);
}

/** Light squares have odd file+rank parity (a1 is dark). */
export function isLightSquare(square: Square): boolean {
  return (fileOf(square) + rankOf(square)) % 2 === 1;
}
