import {
  GameOverError,
  IllegalMoveError,
  createGame,
  currentState,
  gameReducer,
  legalMovesOf,
  parseUciMove,
  playMove,
  plyCount,
  toFEN,
  undoMove
} from '../index';
import type { Game, MoveRequest } from '../index';
import { fromFEN } from '../notation/fen';
import * as applyMoveModule from '../applyMove';

function uci(text: string): MoveRequest {
  const m = parseUciMove(text);
  if (!m) throw new Error(`bad uci ${text}`);
  return m;
}

function playAll(game: Game, moves: string[]): Game {
  return moves.reduce((g, m) => playMove(g, uci(m)), game);
}

const KNIGHT_SHUFFLE = ['g1f3', 'g8f6', 'f3g1', 'f6g8'];

describe('game state machine', () => {
  it('starts in progress from the initial position', () => {
    const game = createGame();
    expect(game.status).toEqual({ kind: 'inProgress' });
    expect(game.states).toHaveLength(1);
    expect(legalMovesOf(game)).toHaveLength(20);
  });

  it("Fool's Mate ends in checkmate for Black after 4 plies", () => {
    let game = createGame();
    const line = ['f2f3', 'e7e5', 'g2g4'];
    for (const m of line) {
      game = playMove(game, uci(m));
      expect(game.status).toEqual({ kind: 'inProgress' });
    }
    game = playMove(game, uci('d8h4'));

    expect(game.status).toEqual({ kind: 'checkmate', winner: 'b' });
    expect(plyCount(game)).toBe(4);
    expect(legalMovesOf(game)).toEqual([]);
  });

  it('accepts no moves once the game is over', () => {
    const game = playAll(createGame(), ['f2f3', 'e7e5', 'g2g4', 'd8h4']);
    expect(() => playMove(game, uci('a2a3'))).toThrow(GameOverError);
  });

  it('rejects illegal moves and keeps the game unchanged', () => {
    const game = createGame();
    expect(() => playMove(game, uci('e2e5'))).toThrow(IllegalMoveError);
    expect(game.states).toHaveLength(1);
    expect(game.moves).toHaveLength(0);
  });

  it('draws by repetition on the third occurrence, not the second', () => {
    let game = playAll(createGame(), KNIGHT_SHUFFLE);
    // The starting position has now occurred twice.
    expect(game.status).toEqual({ kind: 'inProgress' });

    game = playAll(game, KNIGHT_SHUFFLE.slice(0, 3));
    expect(game.status).toEqual({ kind: 'inProgress' });

    game = playMove(game, uci(KNIGHT_SHUFFLE[3]));
    expect(game.status).toEqual({ kind: 'draw', reason: 'repetition' });
    expect(plyCount(game)).toBe(8);
  });

  it('treats positions with different castling rights as different', () => {
    const start = fromFEN('r3k2r/8/8/8/8/8/8/R3K2R w KQkq - 0 1');
    const shuffle = ['h1h2', 'h8h7', 'h2h1', 'h7h8'];
    let game = playAll(createGame(start), [...shuffle, ...shuffle]);
    // The starting placement has now been seen three times, but only the first had KQkq.
    expect(game.status).toEqual({ kind: 'inProgress' });

    game = playAll(game, ['h1h2', 'h8h7']);
    // Rights are Qq from ply 2 on, so plies 2, 6 and 10 are the same position.
    expect(game.status).toEqual({ kind: 'draw', reason: 'repetition' });
    expect(plyCount(game)).toBe(10);
  });

  it('detects insufficient material after a capture', () => {
    const start = fromFEN('4k3/8/8/8/8/8/3r4/4K3 w - - 0 1');
    const game = playMove(createGame(start), uci('e1d2'));
    expect(game.status).toEqual({ kind: 'draw', reason: 'insufficientMaterial' });
  });

  it('a game created from a finished position is already terminal', () => {
    const game = createGame(fromFEN('4k3/8/8/8/8/8/8/4K3 w - - 0 1'));
    expect(game.status).toEqual({ kind: 'draw', reason: 'insufficientMaterial' });
    expect(legalMovesOf(game)).toEqual([]);
  });

  it('undoMove takes back one ply and recomputes the status', () => {
    const mated = playAll(createGame(), ['f2f3', 'e7e5', 'g2g4', 'd8h4']);
    const undone = undoMove(mated);
    expect(plyCount(undone)).toBe(3);
    expect(undone.status).toEqual({ kind: 'inProgress' });
    expect(toFEN(currentState(undone))).toBe('rnbqkbnr/pppp1ppp/8/4p3/6P1/5P2/PPPPP2P/RNBQKBNR b KQkq g3 0 2');

    const fresh = createGame();
    expect(undoMove(fresh)).toBe(fresh);
  });

  it('gameReducer drives the same transitions', () => {
    let game = gameReducer(createGame(), { type: 'playMove', move: uci('e2e4') });
    expect(toFEN(currentState(game))).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');

    game = gameReducer(game, { type: 'undo' });
    expect(plyCount(game)).toBe(0);

    const start = fromFEN('4k3/8/8/8/8/8/8/R3K3 w Q - 0 1');
    game = gameReducer(game, { type: 'newGame', initial: start });
    expect(currentState(game)).toBe(start);

    game = gameReducer(game, { type: 'newGame' });
    expect(legalMovesOf(game)).toHaveLength(20);
  });

  it('plays every move through the move applier and records the resolved move', () => {
    const applied = jest.spyOn(applyMoveModule, 'applyLegalMove');
    try {
      const game = playMove(createGame(), { from: 12, to: 28 });

      expect(applied).toHaveBeenCalledTimes(1);
      expect(game.moves[0]).toEqual({
        from: 12,
        to: 28,
        flags: { isCapture: false, isEnPassant: false, isCastleKingside: false, isCastleQueenside: false }
      });
      expect(toFEN(currentState(game))).toBe('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1');
    } finally {
      applied.mockRestore();
    }
  });
});
