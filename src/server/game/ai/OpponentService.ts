/**
 * Opponent Service - contract shared by every source of computer moves.
 *
 * Adapters (local strategies, a scripted mock, a remote HTTP service) all
 * expose the same async surface so that the battle orchestrator and its
 * fallback policy can treat them interchangeably.
 */

import type { Difficulty, GameState, Position } from '../../../shared/types/game';

export type OpponentServiceKind = 'local' | 'mock' | 'remote';

/**
 * Failure categories surfaced by opponent adapters. The fallback policy
 * treats all of them alike; the distinction is for logs and callers that
 * inspect health.
 */
export type OpponentServiceErrorCode =
  | 'SERVICE_UNAVAILABLE'
  | 'STRATEGY_ERROR'
  | 'NO_VALID_MOVES'
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT';

export class OpponentServiceError extends Error {
  readonly code: OpponentServiceErrorCode;
  readonly serviceName: string | undefined;

  constructor(code: OpponentServiceErrorCode, message: string, serviceName?: string) {
    super(message);
    this.name = 'OpponentServiceError';
    this.code = code;
    this.serviceName = serviceName;
    Object.setPrototypeOf(this, OpponentServiceError.prototype);
  }
}

export function isOpponentServiceError(error: unknown): error is OpponentServiceError {
  return error instanceof OpponentServiceError;
}

export interface OpponentMoveResult {
  position: Position;
  /** Wall-clock time the adapter spent, including any simulated delay. */
  thinkingTimeMs: number;
  evaluationScore?: number;
  depthReached?: number;
  nodesEvaluated?: number;
}

export interface OpponentServiceStatus {
  kind: OpponentServiceKind;
  name: string;
  available: boolean;
  supportedDifficulties: Difficulty[];
  lastCheck: Date;
  /** Latency of the availability probe; only set by a health check. */
  responseTimeMs?: number;
}

export interface OpponentService {
  readonly name: string;
  readonly kind: OpponentServiceKind;

  /**
   * Choose a move for `state.currentPlayer`. The state is a private copy;
   * adapters may read it freely but must not rely on it staying current.
   */
  calculateMove(state: GameState, difficulty: Difficulty): Promise<OpponentMoveResult>;

  isAvailable(): Promise<boolean>;

  getSupportedDifficulties(): Difficulty[];

  getStatus(): Promise<OpponentServiceStatus>;

  /**
   * Probe availability and measure the probe latency.
   *
   * @throws OpponentServiceError with code SERVICE_UNAVAILABLE
   */
  healthCheck(): Promise<OpponentServiceStatus>;
}

/**
 * Shared status and health-check behaviour. Subclasses provide the move
 * computation and the availability probe.
 */
export abstract class BaseOpponentService implements OpponentService {
  abstract readonly name: string;
  abstract readonly kind: OpponentServiceKind;

  abstract calculateMove(state: GameState, difficulty: Difficulty): Promise<OpponentMoveResult>;

  abstract isAvailable(): Promise<boolean>;

  abstract getSupportedDifficulties(): Difficulty[];

  async getStatus(): Promise<OpponentServiceStatus> {
    return {
      kind: this.kind,
      name: this.name,
      available: await this.isAvailable(),
      supportedDifficulties: this.getSupportedDifficulties(),
      lastCheck: new Date(),
    };
  }

  async healthCheck(): Promise<OpponentServiceStatus> {
    const start = performance.now();
    const available = await this.isAvailable();
    const responseTimeMs = Math.round(performance.now() - start);

    if (!available) {
      throw new OpponentServiceError(
        'SERVICE_UNAVAILABLE',
        `${this.name}: Service health check failed`,
        this.name
      );
    }

    return {
      kind: this.kind,
      name: this.name,
      available: true,
      supportedDifficulties: this.getSupportedDifficulties(),
      lastCheck: new Date(),
      responseTimeMs,
    };
  }
}
