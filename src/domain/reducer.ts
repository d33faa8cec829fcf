import type { BoardState, MoveRequest } from './chessTypes';
import type { Game } from './game';
import { createGame, playMove, undoMove } from './game';

/**
 * Reducer core.
 *
 * Keeping the authoritative transition logic in a single reducer makes it easy to
 * replay games and drive them from any host (console, tests, a future UI).
 * Illegal moves and moves after the end of the game throw, as `playMove` does.
 */

export type GameAction =
  | { type: 'newGame'; initial?: BoardState }
  | { type: 'playMove'; move: MoveRequest }
  | { type: 'undo' };

export function gameReducer(game: Game, action: GameAction): Game {
  switch (action.type) {
    case 'newGame':
      return createGame(action.initial);
    case 'playMove':
      return playMove(game, action.move);
    case 'undo':
      return undoMove(game);
  }
}
