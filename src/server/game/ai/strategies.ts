/**
 * Move-selection strategies used by the local opponent service.
 *
 * All strategies are synchronous and pure with respect to the supplied
 * state. Each difficulty maps onto exactly one strategy through
 * {@link createStrategy}.
 */

import {
  Board,
  Difficulty,
  GameState,
  Player,
  Position,
  opponentOf,
  playerOrdinal,
} from '../../../shared/types/game';
import { cloneBoard, countPieces, setCell } from '../../../shared/engine/board';
import { getFlippedPositions, getLegalMoves } from '../../../shared/engine/moveResolution';
import { getMoveCount, isFinished } from '../../../shared/engine/gameState';
import { evaluatePosition, type EvaluationWeights } from '../../../shared/engine/evaluation';
import { OpponentServiceError } from './OpponentService';

export interface StrategyDecision {
  position: Position;
  evaluationScore?: number;
  depthReached?: number;
  nodesEvaluated?: number;
}

export interface OpponentStrategy {
  readonly name: string;
  readonly difficulty: Difficulty;

  /**
   * @throws OpponentServiceError STRATEGY_ERROR for a finished game,
   *   NO_VALID_MOVES when the side to move must pass
   */
  calculateMove(state: GameState): Position;

  /** Same as calculateMove, with search statistics where the strategy has them. */
  analyze(state: GameState): StrategyDecision;
}

/**
 * Legal moves for the side to move, or the error a strategy reports when
 * it cannot produce one.
 */
export function requireLegalMoves(state: GameState, serviceName: string): Position[] {
  if (isFinished(state)) {
    throw new OpponentServiceError(
      'STRATEGY_ERROR',
      'Cannot calculate move for finished game',
      serviceName
    );
  }

  const legalMoves = getLegalMoves(state.board, state.currentPlayer);
  if (legalMoves.length === 0) {
    throw new OpponentServiceError('NO_VALID_MOVES', 'No valid moves available', serviceName);
  }
  return legalMoves;
}

abstract class BaseStrategy implements OpponentStrategy {
  abstract readonly name: string;
  abstract readonly difficulty: Difficulty;

  calculateMove(state: GameState): Position {
    return this.analyze(state).position;
  }

  analyze(state: GameState): StrategyDecision {
    return this.choose(state, requireLegalMoves(state, this.name));
  }

  protected abstract choose(state: GameState, legalMoves: Position[]): StrategyDecision;
}

/**
 * Easy tier. Not random at all: the pick is a fixed function of the move
 * count and the mover, so the same position always yields the same reply.
 */
export class RandomStrategy extends BaseStrategy {
  readonly name = 'RandomStrategy';
  readonly difficulty = 'easy';

  protected choose(state: GameState, legalMoves: Position[]): StrategyDecision {
    const index =
      (getMoveCount(state) * 7 + playerOrdinal(state.currentPlayer) * 3) % legalMoves.length;
    return { position: legalMoves[index] };
  }
}

// ---------------------------------------------------------------------------
// Fixed-depth search
// ---------------------------------------------------------------------------

/** Decisive result; dominates any heuristic score. */
const WIN_SCORE = 10_000;

function playOnBoard(board: Board, player: Player, position: Position): Board {
  const next = cloneBoard(board);
  const flipped = getFlippedPositions(board, player, position);
  setCell(next, position, player);
  for (const p of flipped) {
    setCell(next, p, player);
  }
  return next;
}

function terminalScore(board: Board, perspective: Player): number {
  const score = countPieces(board);
  const diff = score[perspective] - score[opponentOf(perspective)];
  return Math.sign(diff) * WIN_SCORE + diff;
}

interface SearchContext {
  perspective: Player;
  weights?: EvaluationWeights;
  nodes: number;
  pruning: boolean;
}

/**
 * Minimax from `perspective`'s point of view. A side without moves passes;
 * two consecutive passes end the line with a decisive score.
 */
function search(
  ctx: SearchContext,
  board: Board,
  toMove: Player,
  depth: number,
  alpha: number,
  beta: number
): number {
  ctx.nodes += 1;

  const moves = getLegalMoves(board, toMove);
  if (moves.length === 0) {
    if (getLegalMoves(board, opponentOf(toMove)).length === 0) {
      return terminalScore(board, ctx.perspective);
    }
    if (depth === 0) {
      return evaluatePosition(board, ctx.perspective, ctx.weights);
    }
    return search(ctx, board, opponentOf(toMove), depth - 1, alpha, beta);
  }

  if (depth === 0) {
    return evaluatePosition(board, ctx.perspective, ctx.weights);
  }

  const maximizing = toMove === ctx.perspective;
  let best = maximizing ? -Infinity : Infinity;

  for (const move of moves) {
    const value = search(
      ctx,
      playOnBoard(board, toMove, move),
      opponentOf(toMove),
      depth - 1,
      alpha,
      beta
    );

    if (maximizing) {
      best = Math.max(best, value);
      alpha = Math.max(alpha, best);
    } else {
      best = Math.min(best, value);
      beta = Math.min(beta, best);
    }

    if (ctx.pruning && alpha >= beta) {
      break;
    }
  }

  return best;
}

abstract class SearchStrategy extends BaseStrategy {
  protected abstract readonly pruning: boolean;

  constructor(
    readonly depth: number,
    private readonly weights?: EvaluationWeights
  ) {
    super();
  }

  protected choose(state: GameState, legalMoves: Position[]): StrategyDecision {
    const perspective = state.currentPlayer;
    const ctx: SearchContext = {
      perspective,
      weights: this.weights,
      nodes: 0,
      pruning: this.pruning,
    };

    let bestMove = legalMoves[0];
    let bestScore = -Infinity;
    let alpha = -Infinity;

    // Ties keep the earliest move in row-major order.
    for (const move of legalMoves) {
      const score = search(
        ctx,
        playOnBoard(state.board, perspective, move),
        opponentOf(perspective),
        this.depth - 1,
        alpha,
        Infinity
      );
      if (score > bestScore) {
        bestScore = score;
        bestMove = move;
      }
      if (this.pruning) {
        alpha = Math.max(alpha, bestScore);
      }
    }

    return {
      position: bestMove,
      evaluationScore: bestScore,
      depthReached: this.depth,
      nodesEvaluated: ctx.nodes,
    };
  }
}

/** Medium tier: exhaustive minimax. */
export class MinimaxStrategy extends SearchStrategy {
  readonly name = 'MinimaxStrategy';
  readonly difficulty = 'medium';
  protected readonly pruning = false;

  constructor(depth: number = 3, weights?: EvaluationWeights) {
    super(depth, weights);
  }
}

/** Hard tier: minimax with alpha-beta cut-offs. */
export class AlphaBetaStrategy extends SearchStrategy {
  readonly name = 'AlphaBetaStrategy';
  readonly difficulty = 'hard';
  protected readonly pruning = true;

  constructor(depth: number = 5, weights?: EvaluationWeights) {
    super(depth, weights);
  }
}

export function createStrategy(difficulty: Difficulty): OpponentStrategy {
  switch (difficulty) {
    case 'easy':
      return new RandomStrategy();
    case 'medium':
      return new MinimaxStrategy(3);
    case 'hard':
      return new AlphaBetaStrategy(5);
  }
}
