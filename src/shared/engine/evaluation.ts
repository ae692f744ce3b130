import { BOARD_SIZE, Board, Player, opponentOf } from '../types/game';
import { CORNERS, countPieces, getCell } from './board';
import { getLegalMoves } from './moveResolution';

/**
 * Relative importance of each positional feature. All features are
 * reported from `player`'s perspective: positive favours the player.
 */
export interface EvaluationWeights {
  pieceCount: number;
  cornerControl: number;
  edgeControl: number;
  mobility: number;
}

export const DEFAULT_EVALUATION_WEIGHTS: Readonly<EvaluationWeights> = {
  pieceCount: 1,
  cornerControl: 10,
  edgeControl: 5,
  mobility: 3,
};

export function evaluatePieceCount(board: Board, player: Player): number {
  const score = countPieces(board);
  return score[player] - score[opponentOf(player)];
}

/** +1 per owned corner, -1 per opponent corner. */
export function evaluateCornerControl(board: Board, player: Player): number {
  let score = 0;
  for (const corner of CORNERS) {
    const cell = getCell(board, corner);
    if (cell === player) score += 1;
    else if (cell !== 'empty') score -= 1;
  }
  return score;
}

/**
 * ±0.5 for each disc on the outer ring. Corners are part of the ring and
 * count here as well as in corner control.
 */
export function evaluateEdgeControl(board: Board, player: Player): number {
  const last = BOARD_SIZE - 1;
  let score = 0;

  const tally = (row: number, col: number): void => {
    const cell = board[row][col];
    if (cell === player) score += 0.5;
    else if (cell !== 'empty') score -= 0.5;
  };

  for (let col = 0; col < BOARD_SIZE; col++) {
    tally(0, col);
    tally(last, col);
  }
  for (let row = 1; row < last; row++) {
    tally(row, 0);
    tally(row, last);
  }
  return score;
}

export function evaluateMobility(board: Board, player: Player): number {
  return getLegalMoves(board, player).length - getLegalMoves(board, opponentOf(player)).length;
}

export function evaluatePosition(
  board: Board,
  player: Player,
  weights: EvaluationWeights = DEFAULT_EVALUATION_WEIGHTS
): number {
  return (
    evaluatePieceCount(board, player) * weights.pieceCount +
    evaluateCornerControl(board, player) * weights.cornerControl +
    evaluateEdgeControl(board, player) * weights.edgeControl +
    evaluateMobility(board, player) * weights.mobility
  );
}
