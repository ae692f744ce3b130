/**
 * Opponent backed by an external move service over HTTP.
 *
 * Wire format:
 *   POST {baseURL}/move   { board, currentPlayer, moveCount, difficulty }
 *                      -> { row, col, thinkingTimeMs?, evaluation?, depth?, nodes? }
 *   GET  {baseURL}/health -> any 2xx means available
 *
 * Requests go through a circuit breaker so that a failing service is not
 * hammered while the fallback adapter covers for it.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Difficulty, GameState, Player } from '../../../shared/types/game';
import { DIFFICULTIES } from '../../../shared/types/game';
import { isLegalMove } from '../../../shared/engine/moveResolution';
import { getMoveCount } from '../../../shared/engine/gameState';
import { logger } from '../../utils/logger';
import {
  BaseOpponentService,
  OpponentMoveResult,
  OpponentServiceError,
  isOpponentServiceError,
  type OpponentServiceErrorCode,
  type OpponentServiceKind,
} from './OpponentService';
import { requireLegalMoves } from './strategies';

/**
 * Opens after `threshold` consecutive failures and rejects calls until
 * `cooldownMs` has elapsed, then lets the next call through (half-open).
 */
export class CircuitBreaker {
  private failureCount = 0;
  private lastFailureTime = 0;
  private isOpen = false;

  constructor(
    private readonly threshold: number = 5,
    private readonly cooldownMs: number = 60_000,
    private readonly now: () => number = Date.now
  ) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.isOpen) {
      if (this.now() - this.lastFailureTime > this.cooldownMs) {
        logger.info('Circuit breaker transitioning from open to half-open');
        this.reset();
      } else {
        throw new OpponentServiceError(
          'SERVICE_UNAVAILABLE',
          'Circuit breaker is open - remote opponent temporarily unavailable'
        );
      }
    }

    try {
      const result = await fn();
      this.reset();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.failureCount >= this.threshold && !this.isOpen) {
      this.isOpen = true;
      logger.warn('Circuit breaker opened after repeated failures', {
        failureCount: this.failureCount,
        threshold: this.threshold,
      });
    }
  }

  private reset(): void {
    if (this.failureCount > 0 || this.isOpen) {
      logger.info('Circuit breaker reset', {
        previousFailures: this.failureCount,
        wasOpen: this.isOpen,
      });
    }
    this.failureCount = 0;
    this.isOpen = false;
  }

  getStatus(): { isOpen: boolean; failureCount: number } {
    return { isOpen: this.isOpen, failureCount: this.failureCount };
  }

  isCircuitOpen(): boolean {
    return this.isOpen && this.now() - this.lastFailureTime <= this.cooldownMs;
  }
}

const RemoteMoveResponseSchema = z.object({
  row: z.number().int(),
  col: z.number().int(),
  thinkingTimeMs: z.number().nonnegative().optional(),
  evaluation: z.number().optional(),
  depth: z.number().int().nonnegative().optional(),
  nodes: z.number().int().nonnegative().optional(),
});

export interface RemoteMoveRequest {
  board: Array<Array<Player | null>>;
  currentPlayer: Player;
  moveCount: number;
  difficulty: Difficulty;
}

export interface RemoteOpponentOptions {
  baseURL: string;
  timeoutMs: number;
  supportedDifficulties?: Difficulty[];
  circuitBreaker?: CircuitBreaker;
}

/**
 * Transport details of an axios failure, read without depending on axios
 * internals.
 */
function describeTransportError(error: unknown): { code?: string; status?: number } {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  let status: number | undefined;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const { response } = error;
    if ('status' in response && typeof response.status === 'number') {
      status = response.status;
    }
  }
  return { code, status };
}

function classifyTransportError(error: unknown): OpponentServiceErrorCode {
  const { code, status } = describeTransportError(error);
  if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') return 'TIMEOUT';
  if (status === undefined || status >= 500) return 'SERVICE_UNAVAILABLE';
  return 'STRATEGY_ERROR';
}

export class RemoteOpponentService extends BaseOpponentService {
  readonly name = 'RemoteOpponentService';
  readonly kind: OpponentServiceKind = 'remote';

  private readonly client: AxiosInstance;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly supportedDifficulties: Difficulty[];

  constructor(options: RemoteOpponentOptions) {
    super();
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker();
    this.supportedDifficulties = options.supportedDifficulties ?? [...DIFFICULTIES];
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async calculateMove(state: GameState, difficulty: Difficulty): Promise<OpponentMoveResult> {
    if (!this.supportedDifficulties.includes(difficulty)) {
      throw new OpponentServiceError(
        'STRATEGY_ERROR',
        `Difficulty ${difficulty} is not supported by remote opponent`,
        this.name
      );
    }
    requireLegalMoves(state, this.name);

    const request: RemoteMoveRequest = {
      board: state.board.map((row) => row.map((cell) => (cell === 'empty' ? null : cell))),
      currentPlayer: state.currentPlayer,
      moveCount: getMoveCount(state),
      difficulty,
    };

    const start = performance.now();
    const data = await this.circuitBreaker.execute(async () => {
      try {
        const response = await this.client.post<unknown>('/move', request);
        return response.data;
      } catch (error) {
        const code = classifyTransportError(error);
        logger.error('Remote opponent request failed', {
          code,
          error: error instanceof Error ? error.message : String(error),
          difficulty,
        });
        throw new OpponentServiceError(
          code,
          `Remote opponent request failed: ${error instanceof Error ? error.message : String(error)}`,
          this.name
        );
      }
    });

    const parsed = RemoteMoveResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new OpponentServiceError(
        'STRATEGY_ERROR',
        'Remote opponent returned a malformed move',
        this.name
      );
    }

    const position = { row: parsed.data.row, col: parsed.data.col };
    if (!isLegalMove(state.board, state.currentPlayer, position)) {
      throw new OpponentServiceError(
        'STRATEGY_ERROR',
        `Remote opponent returned an illegal move (${position.row}, ${position.col})`,
        this.name
      );
    }

    return {
      position,
      thinkingTimeMs: parsed.data.thinkingTimeMs ?? Math.round(performance.now() - start),
      evaluationScore: parsed.data.evaluation,
      depthReached: parsed.data.depth,
      nodesEvaluated: parsed.data.nodes,
    };
  }

  async isAvailable(): Promise<boolean> {
    if (this.circuitBreaker.isCircuitOpen()) {
      return false;
    }
    try {
      await this.client.get('/health');
      return true;
    } catch (error) {
      logger.debug('Remote opponent health probe failed', {
        error: isOpponentServiceError(error) ? error.code : String(error),
      });
      return false;
    }
  }

  getSupportedDifficulties(): Difficulty[] {
    return [...this.supportedDifficulties];
  }

  getCircuitBreakerStatus(): { isOpen: boolean; failureCount: number } {
    return this.circuitBreaker.getStatus();
  }
}
