import type { Difficulty, GameState, Position } from '../../../shared/types/game';
import { DIFFICULTIES, positionsEqual } from '../../../shared/types/game';
import { getLegalMoves } from '../../../shared/engine/moveResolution';
import { isFinished } from '../../../shared/engine/gameState';
import { delay } from '../../../shared/utils/timeout';
import {
  BaseOpponentService,
  OpponentMoveResult,
  OpponentServiceError,
  type OpponentServiceKind,
} from './OpponentService';

export interface MockOpponentConfig {
  available: boolean;
  /** Artificial latency before replying. */
  responseTimeMs: number;
  shouldError: boolean;
  errorMessage: string;
  /** Reply with this square when it is legal; otherwise the first legal move. */
  fixedMove?: Position;
  supportedDifficulties: Difficulty[];
}

export const DEFAULT_MOCK_CONFIG: Readonly<MockOpponentConfig> = {
  available: true,
  responseTimeMs: 100,
  shouldError: false,
  errorMessage: 'Mock opponent error',
  supportedDifficulties: [...DIFFICULTIES],
};

/**
 * Canned search statistics reported with each reply.
 */
const MOCK_METADATA: Record<
  Difficulty,
  { evaluationScore: number; depthReached: number; nodesEvaluated: number }
> = {
  easy: { evaluationScore: 0.1, depthReached: 1, nodesEvaluated: 10 },
  medium: { evaluationScore: 0.5, depthReached: 3, nodesEvaluated: 100 },
  hard: { evaluationScore: 0.9, depthReached: 6, nodesEvaluated: 1000 },
};

/**
 * Scripted opponent for tests and local development.
 */
export class MockOpponentService extends BaseOpponentService {
  readonly name = 'MockOpponentService';
  readonly kind: OpponentServiceKind = 'mock';

  private config: MockOpponentConfig;
  private callCount = 0;

  constructor(config: Partial<MockOpponentConfig> = {}) {
    super();
    this.config = { ...DEFAULT_MOCK_CONFIG, ...config };
  }

  static unavailable(): MockOpponentService {
    return new MockOpponentService({ available: false });
  }

  static failing(errorMessage: string): MockOpponentService {
    return new MockOpponentService({ shouldError: true, errorMessage, responseTimeMs: 0 });
  }

  static withFixedMove(position: Position): MockOpponentService {
    return new MockOpponentService({ fixedMove: position, responseTimeMs: 0 });
  }

  static fast(): MockOpponentService {
    return new MockOpponentService({ responseTimeMs: 0 });
  }

  updateConfig(config: Partial<MockOpponentConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): Readonly<MockOpponentConfig> {
    return this.config;
  }

  /** Number of calculateMove invocations, successful or not. */
  getCallCount(): number {
    return this.callCount;
  }

  async calculateMove(state: GameState, difficulty: Difficulty): Promise<OpponentMoveResult> {
    this.callCount += 1;
    const start = performance.now();
    const { config } = this;

    if (!config.available) {
      throw new OpponentServiceError(
        'SERVICE_UNAVAILABLE',
        'Mock opponent is configured as unavailable',
        this.name
      );
    }

    if (config.shouldError) {
      throw new OpponentServiceError('STRATEGY_ERROR', config.errorMessage, this.name);
    }

    if (!config.supportedDifficulties.includes(difficulty)) {
      throw new OpponentServiceError(
        'STRATEGY_ERROR',
        `Difficulty ${difficulty} is not supported by mock opponent`,
        this.name
      );
    }

    if (isFinished(state)) {
      throw new OpponentServiceError(
        'STRATEGY_ERROR',
        'Cannot calculate move for finished game',
        this.name
      );
    }

    await delay(config.responseTimeMs);

    const legalMoves = getLegalMoves(state.board, state.currentPlayer);
    if (legalMoves.length === 0) {
      throw new OpponentServiceError('NO_VALID_MOVES', 'No valid moves available', this.name);
    }

    const { fixedMove } = config;
    const position =
      fixedMove && legalMoves.some((m) => positionsEqual(m, fixedMove))
        ? { ...fixedMove }
        : legalMoves[0];

    return {
      position,
      thinkingTimeMs: Math.round(performance.now() - start),
      ...MOCK_METADATA[difficulty],
    };
  }

  async isAvailable(): Promise<boolean> {
    return this.config.available;
  }

  getSupportedDifficulties(): Difficulty[] {
    return [...this.config.supportedDifficulties];
  }
}
