// =============================================================================
// REVERSI RULES ENGINE - PUBLIC API
// =============================================================================
// Pure board and turn logic shared by the opponent strategies and the battle
// orchestrator. Nothing here performs I/O or holds state between calls.
// =============================================================================

export type {
  Board,
  Cell,
  Difficulty,
  GameMove,
  GameState,
  GameStatus,
  Player,
  Position,
  Score,
} from '../types/game';

export {
  CORNERS,
  DIRECTIONS,
  boardFromString,
  boardToString,
  cloneBoard,
  countEmpty,
  countPieces,
  createEmptyBoard,
  createInitialBoard,
  createPosition,
  getCell,
  isCorner,
  isEdge,
  isInBounds,
  setCell,
  tryCreatePosition,
} from './board';

export {
  advanceTurn,
  applyMove,
  determineWinner,
  getFlippedPositions,
  getLegalMoves,
  hasLegalMoves,
  isLegalMove,
  isTerminal,
} from './moveResolution';

export {
  cloneGameState,
  createGameState,
  finishGame,
  getMoveCount,
  getScore,
  getWinner,
  isFinished,
  isPaused,
  pauseGame,
  resumeGame,
  switchPlayer,
} from './gameState';

export {
  DEFAULT_EVALUATION_WEIGHTS,
  evaluateCornerControl,
  evaluateEdgeControl,
  evaluateMobility,
  evaluatePieceCount,
  evaluatePosition,
} from './evaluation';
export type { EvaluationWeights } from './evaluation';
