import type { BoardState, Game, Move } from '../domain';
import {
  ChessError,
  createGame,
  currentState,
  describeStatus,
  isTerminal,
  legalMovesOf,
  moveToUci,
  parseMove,
  playMove,
  toFEN,
  toSAN,
  undoMove
} from '../domain';
import type { ConsoleSetup } from './consoleSetup';
import { renderBoard } from './renderBoard';

export const HELP_TEXT = [
  'Enter a move in SAN (e4, Nf3, exd5, O-O, e8=Q) or UCI (e2e4, e7e8q).',
  'Commands: moves, undo, new, fen, help, quit'
].join('\n');

/**
 * Line-oriented driver for a console game. Each input line produces the text to
 * print; the session never writes to the terminal itself.
 */
export class ConsoleSession {
  private game: Game;
  private quitRequested = false;
  private readonly initial: BoardState | undefined;

  constructor(
    private readonly setup: ConsoleSetup,
    initial?: BoardState
  ) {
    this.initial = initial;
    this.game = createGame(initial);
  }

  get current(): Game {
    return this.game;
  }

  isFinished(): boolean {
    return this.quitRequested || isTerminal(this.game.status);
  }

  boardText(): string {
    const state = currentState(this.game);
    const board = renderBoard(state, this.setup);
    if (isTerminal(this.game.status)) return `${board}\n${describeStatus(this.game.status)}`;
    return `${board}\n${state.sideToMove === 'w' ? 'White' : 'Black'} to move`;
  }

  private formatMove(state: BoardState, move: Move): string {
    return this.setup.notation === 'uci' ? moveToUci(move) : toSAN(state, move);
  }

  handleLine(line: string): string {
    const input = line.trim();
    switch (input.toLowerCase()) {
      case '':
        return '';
      case 'help':
        return HELP_TEXT;
      case 'quit':
      case 'exit':
        this.quitRequested = true;
        return 'Bye.';
      case 'fen':
        return toFEN(currentState(this.game));
      case 'moves': {
        const state = currentState(this.game);
        const moves = legalMovesOf(this.game);
        if (moves.length === 0) return 'No legal moves.';
        return moves.map((m) => this.formatMove(state, m)).join(' ');
      }
      case 'undo':
        if (this.game.moves.length === 0) return 'Nothing to undo.';
        this.game = undoMove(this.game);
        return this.boardText();
      case 'new':
        this.game = createGame(this.initial);
        return this.boardText();
      default:
        return this.playInput(input);
    }
  }

  private playInput(input: string): string {
    const state = currentState(this.game);
    const parsed = parseMove(input, state);
    if (!parsed.ok) return parsed.error;

    try {
      this.game = playMove(this.game, parsed.value);
    } catch (err) {
      if (err instanceof ChessError) return err.message;
      throw err;
    }
    const side = state.sideToMove === 'w' ? 'White' : 'Black';
    return `${side} plays ${this.formatMove(state, parsed.value)}\n${this.boardText()}`;
  }
}
