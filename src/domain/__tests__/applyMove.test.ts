import { applyMove } from '../applyMove';
import { getPiece } from '../board';
import { IllegalMoveError } from '../errors';
import { createInitialBoardState } from '../gameState';
import { toFEN } from '../notation/fen';
import { boardOf, mkState, sq } from './testUtils';

describe('applyMove', () => {
  it('executes king-side castling (moves rook + clears castling rights)', () => {
    const state = mkState({
      board: boardOf(['e1', 'w', 'k'], ['h1', 'w', 'r'], ['e8', 'b', 'k']),
      castling: { wK: true, wQ: true, bK: false, bQ: false },
      halfmoveClock: 3
    });

    const next = applyMove(state, { from: sq('e1'), to: sq('g1') });

    expect(getPiece(next.board, sq('g1'))).toEqual({ color: 'w', type: 'k' });
    expect(getPiece(next.board, sq('f1'))).toEqual({ color: 'w', type: 'r' });
    expect(getPiece(next.board, sq('h1'))).toBeNull();
    expect(getPiece(next.board, sq('e1'))).toBeNull();

    expect(next.castling).toEqual({ wK: false, wQ: false, bK: false, bQ: false });
    expect(next.sideToMove).toBe('b');
    expect(next.enPassantTarget).toBeNull();
    expect(next.halfmoveClock).toBe(4);
    expect(next.fullmoveNumber).toBe(1);
  });

  it('executes queen-side castling for black', () => {
    const state = mkState({
      board: boardOf(['e1', 'w', 'k'], ['e8', 'b', 'k'], ['a8', 'b', 'r'], ['h8', 'b', 'r']),
      sideToMove: 'b',
      castling: { wK: false, wQ: false, bK: true, bQ: true }
    });

    const next = applyMove(state, { from: sq('e8'), to: sq('c8') });

    expect(getPiece(next.board, sq('c8'))).toEqual({ color: 'b', type: 'k' });
    expect(getPiece(next.board, sq('d8'))).toEqual({ color: 'b', type: 'r' });
    expect(getPiece(next.board, sq('a8'))).toBeNull();
    expect(getPiece(next.board, sq('h8'))).toEqual({ color: 'b', type: 'r' });
    expect(next.castling.bK).toBe(false);
    expect(next.castling.bQ).toBe(false);
    expect(next.fullmoveNumber).toBe(2);
  });

  it('executes en passant capture (removes captured pawn behind target)', () => {
    const state = mkState({
      board: boardOf(['e5', 'w', 'p'], ['d5', 'b', 'p'], ['e8', 'b', 'k'], ['e1', 'w', 'k']),
      enPassantTarget: sq('d6'),
      halfmoveClock: 7
    });

    const next = applyMove(state, { from: sq('e5'), to: sq('d6') });

    expect(getPiece(next.board, sq('d6'))).toEqual({ color: 'w', type: 'p' });
    expect(getPiece(next.board, sq('d5'))).toBeNull(); // captured pawn removed
    expect(getPiece(next.board, sq('e5'))).toBeNull();
    expect(next.halfmoveClock).toBe(0);
    expect(next.enPassantTarget).toBeNull();
  });

  it('handles pawn promotion (replaces pawn with selected piece)', () => {
    const state = mkState({ board: boardOf(['a7', 'w', 'p'], ['e1', 'w', 'k'], ['e8', 'b', 'k']) });
    const next = applyMove(state, { from: sq('a7'), to: sq('a8'), promotion: 'n' });

    expect(getPiece(next.board, sq('a8'))).toEqual({ color: 'w', type: 'n' });
    expect(getPiece(next.board, sq('a7'))).toBeNull();
    expect(next.halfmoveClock).toBe(0);
  });

  it('rejects a promotion move without a promotion piece', () => {
    const state = mkState({ board: boardOf(['a7', 'w', 'p'], ['e1', 'w', 'k'], ['e8', 'b', 'k']) });
    expect(() => applyMove(state, { from: sq('a7'), to: sq('a8') })).toThrow(IllegalMoveError);
  });

  it('sets enPassantTarget on pawn double push and clears it on the next move', () => {
    const state = mkState({ board: boardOf(['e2', 'w', 'p'], ['e1', 'w', 'k'], ['e8', 'b', 'k']) });
    const next = applyMove(state, { from: sq('e2'), to: sq('e4') });

    expect(next.enPassantTarget).toBe(sq('e3'));
    expect(next.halfmoveClock).toBe(0);

    const after = applyMove(next, { from: sq('e8'), to: sq('d8') });
    expect(after.enPassantTarget).toBeNull();
  });

  it('increments fullmove number after black move', () => {
    const state = mkState({
      board: boardOf(['e1', 'w', 'k'], ['e8', 'b', 'k'], ['a8', 'b', 'r']),
      sideToMove: 'b',
      fullmoveNumber: 7
    });
    const next = applyMove(state, { from: sq('a8'), to: sq('a7') });
    expect(next.fullmoveNumber).toBe(8);
    expect(next.sideToMove).toBe('w');
    expect(next.halfmoveClock).toBe(1);
  });

  it('revokes castling rights when a rook moves or is captured on its corner', () => {
    const state = mkState({
      board: boardOf(['e1', 'w', 'k'], ['a1', 'w', 'r'], ['h1', 'w', 'r'], ['e8', 'b', 'k'], ['h8', 'b', 'r']),
      castling: { wK: true, wQ: true, bK: true, bQ: false }
    });

    const rookMoved = applyMove(state, { from: sq('a1'), to: sq('a4') });
    expect(rookMoved.castling).toEqual({ wK: true, wQ: false, bK: true, bQ: false });

    const rookTaken = applyMove(state, { from: sq('h1'), to: sq('h8') });
    expect(rookTaken.castling).toEqual({ wK: false, wQ: true, bK: false, bQ: false });
    expect(rookTaken.halfmoveClock).toBe(0);
  });

  it('throws IllegalMoveError and leaves the state untouched', () => {
    const state = createInitialBoardState();
    const before = toFEN(state);

    expect(() => applyMove(state, { from: sq('e2'), to: sq('e5') })).toThrow(IllegalMoveError);
    expect(() => applyMove(state, { from: sq('e7'), to: sq('e5') })).toThrow('Illegal move e7e5 (white to move)');
    expect(toFEN(state)).toBe(before);
  });

  it('never mutates the input state on success', () => {
    const state = createInitialBoardState();
    const before = toFEN(state);
    const next = applyMove(state, { from: sq('g1'), to: sq('f3') });
    expect(toFEN(state)).toBe(before);
    expect(toFEN(next)).toBe('rnbqkbnr/pppppppp/8/8/8/5N2/PPPPPPPP/RNBQKB1R b KQkq - 1 1');
  });
});
