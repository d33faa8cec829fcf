import type { Color, MoveRequest } from './chessTypes';

export class ChessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Coordinate outside 0–63 or outside the 8x8 file/rank grid. */
export class InvalidSquareError extends ChessError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Invalid square: ${String(value)}`);
    this.value = value;
  }
}

/** The move is not in the legal set of the position it was played in. */
export class IllegalMoveError extends ChessError {
  readonly move: MoveRequest;
  readonly sideToMove: Color;

  constructor(move: MoveRequest, sideToMove: Color) {
    super(`Illegal move ${describeRequest(move)} (${sideToMove === 'w' ? 'white' : 'black'} to move)`);
    this.move = move;
    this.sideToMove = sideToMove;
  }
}

export class GameOverError extends ChessError {
  constructor(statusKind: string) {
    super(`Game is over (${statusKind}); no further moves are accepted`);
  }
}

export class InvalidFenError extends ChessError {}

function describeRequest(move: MoveRequest): string {
  const sq = (s: number) =>
    Number.isInteger(s) && s >= 0 && s < 64 ? `${'abcdefgh'[s % 8]}${Math.floor(s / 8) + 1}` : String(s);
  return `${sq(move.from)}${sq(move.to)}${move.promotion ?? ''}`;
}
