import {
  InvalidSquareError,
  countPieces,
  createInitialBoardState,
  createStartingBoard,
  getPiece,
  pieceAt,
  sideToMove
} from '..';
import { sq } from './testUtils';

describe('domain/starting position', () => {
  it('creates the correct starting position pieces', () => {
    const b = createStartingBoard();

    expect(getPiece(b, sq('a1'))).toEqual({ color: 'w', type: 'r' });
    expect(getPiece(b, sq('e1'))).toEqual({ color: 'w', type: 'k' });
    expect(getPiece(b, sq('d8'))).toEqual({ color: 'b', type: 'q' });
    expect(getPiece(b, sq('e8'))).toEqual({ color: 'b', type: 'k' });
    expect(getPiece(b, sq('a2'))).toEqual({ color: 'w', type: 'p' });
    expect(getPiece(b, sq('h7'))).toEqual({ color: 'b', type: 'p' });

    expect(countPieces(b)).toBe(32);
  });

  it('initial board state has correct defaults', () => {
    const s = createInitialBoardState();
    expect(s.sideToMove).toBe('w');
    expect(s.castling).toEqual({ wK: true, wQ: true, bK: true, bQ: true });
    expect(s.enPassantTarget).toBeNull();
    expect(s.halfmoveClock).toBe(0);
    expect(s.fullmoveNumber).toBe(1);
    expect(s.board).toHaveLength(64);
  });

  it('exposes pieceAt and sideToMove accessors', () => {
    const s = createInitialBoardState();
    expect(pieceAt(s, 3)).toEqual({ color: 'w', type: 'q' }); // d1
    expect(pieceAt(s, 28)).toBeNull(); // e4
    expect(sideToMove(s)).toBe('w');
    expect(() => pieceAt(s, 64)).toThrow(InvalidSquareError);
  });
});
