export type {
  Board,
  BoardState,
  CastlingRights,
  Color,
  DrawReason,
  GameStatus,
  Move,
  MoveFlags,
  MoveRequest,
  Piece,
  PieceType,
  PromotionType,
  Square
} from './chessTypes';

export { NO_FLAGS, isCastle, oppositeColor } from './chessTypes';

export { ChessError, GameOverError, IllegalMoveError, InvalidFenError, InvalidSquareError } from './errors';

export {
  FILES,
  RANKS,
  assertSquare,
  fileOf,
  isLightSquare,
  isSquare,
  makeSquare,
  mirrorRank,
  parseAlgebraicSquare,
  rankOf,
  squareAt,
  toAlgebraic
} from './square';

export { countPieces, createEmptyBoard, createStartingBoard, findPieces, getPiece, piece, setPiece } from './board';

export {
  NO_CASTLING_RIGHTS,
  STARTING_CASTLING_RIGHTS,
  createInitialBoardState,
  pieceAt,
  sideToMove
} from './gameState';

export { findKing, isInCheck, isSquareAttacked, pieceAttacks } from './attack';
export { compareMoves, createMove, generatePseudoLegalMoves } from './movegen';
export { findLegalMove, generateLegalMoves, isLegalMove, sameMove } from './legalMoves';
export type { AppliedMove } from './applyMove';
export { applyLegalMove, applyMove } from './applyMove';

export { countRepetitions, positionKey } from './repetition';
export { describeStatus, getGameStatus, isInsufficientMaterial, isTerminal } from './gameStatus';

export type { Game } from './game';
export { createGame, currentState, legalMovesOf, playMove, plyCount, undoMove } from './game';
export type { GameAction } from './reducer';
export { gameReducer } from './reducer';

export type { FenParseResult } from './notation/fen';
export { STARTING_FEN, fromFEN, toFEN, tryParseFEN } from './notation/fen';
export { moveToUci, parseUciMove } from './notation/uci';
export { toSAN } from './notation/san';
export type { MoveParseResult } from './notation/parseMove';
export { parseMove } from './notation/parseMove';
