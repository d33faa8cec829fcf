import type { BoardState, GameStatus, Move, MoveRequest } from './chessTypes';
import { GameOverError } from './errors';
import { createInitialBoardState } from './gameState';
import { generateLegalMoves } from './legalMoves';
import { applyLegalMove } from './applyMove';
import { getGameStatus, isTerminal } from './gameStatus';

/**
 * A game in progress: every position reached so far (for repetition detection),
 * the moves between them, and the status of the last position.
 *
 * Invariant: `states.length === moves.length + 1`.
 */
export type Game = {
  readonly states: readonly BoardState[];
  readonly moves: readonly Move[];
  readonly status: GameStatus;
};

export function createGame(initial: BoardState = createInitialBoardState()): Game {
  const states = [initial];
  return { states, moves: [], status: getGameStatus(initial, states) };
}

export function currentState(game: Game): BoardState {
  return game.states[game.states.length - 1];
}

/** Legal moves in the current position; empty once the game is over. */
export function legalMovesOf(game: Game): Move[] {
  if (isTerminal(game.status)) return [];
  return generateLegalMoves(currentState(game));
}

/**
 * Plays one ply.
 *
 * Throws `GameOverError` once the game has ended and `IllegalMoveError` for a
 * move outside the legal set; `game` is left as it was in both cases.
 */
export function playMove(game: Game, request: MoveRequest): Game {
  if (isTerminal(game.status)) throw new GameOverError(game.status.kind);

  const { move, next } = applyLegalMove(currentState(game), request);
  const states = [...game.states, next];
  return { states, moves: [...game.moves, move], status: getGameStatus(next, states) };
}

/** Takes back the last ply. A game with no moves is returned unchanged. */
export function undoMove(game: Game): Game {
  if (game.moves.length === 0) return game;
  const states = game.states.slice(0, -1);
  return { states, moves: game.moves.slice(0, -1), status: getGameStatus(states[states.length - 1], states) };
}

export function plyCount(game: Game): number {
  return game.moves.length;
}
