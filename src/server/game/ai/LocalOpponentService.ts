import type { Difficulty, GameState } from '../../../shared/types/game';
import { DIFFICULTIES } from '../../../shared/types/game';
import { delay, runWithTimeout } from '../../../shared/utils/timeout';
import { logger } from '../../utils/logger';
import {
  BaseOpponentService,
  OpponentMoveResult,
  OpponentServiceError,
  type OpponentServiceKind,
} from './OpponentService';
import { createStrategy, requireLegalMoves } from './strategies';

/**
 * Simulated thinking time per difficulty, so that replies feel paced in a UI.
 */
export const THINKING_TIME_MS: Record<Difficulty, number> = {
  easy: 500,
  medium: 1500,
  hard: 3000,
};

export interface LocalOpponentOptions {
  /** Skip the simulated thinking delay entirely. */
  fastMode?: boolean;
  /** Upper bound on one move computation, delay included. */
  timeoutMs?: number;
}

/**
 * In-process opponent backed by the strategies in ./strategies.
 */
export class LocalOpponentService extends BaseOpponentService {
  readonly name = 'LocalOpponentService';
  readonly kind: OpponentServiceKind = 'local';

  private readonly fastMode: boolean;
  private readonly timeoutMs: number;

  constructor(options: LocalOpponentOptions = {}) {
    super();
    this.fastMode = options.fastMode ?? false;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  getThinkingTime(difficulty: Difficulty): number {
    return this.fastMode ? 0 : THINKING_TIME_MS[difficulty];
  }

  async calculateMove(state: GameState, difficulty: Difficulty): Promise<OpponentMoveResult> {
    const strategy = createStrategy(difficulty);

    const result = await runWithTimeout(
      async () => {
        // A finished game or a forced pass fails without the artificial delay.
        requireLegalMoves(state, this.name);
        await delay(this.getThinkingTime(difficulty));
        return strategy.analyze(state);
      },
      { timeoutMs: this.timeoutMs }
    );

    if (result.kind === 'timeout') {
      logger.warn('Local opponent exceeded its time budget', {
        difficulty,
        timeoutMs: this.timeoutMs,
      });
      throw new OpponentServiceError(
        'TIMEOUT',
        `Move calculation exceeded ${this.timeoutMs}ms`,
        this.name
      );
    }

    const decision = result.value;
    return {
      position: decision.position,
      thinkingTimeMs: Math.round(result.durationMs),
      evaluationScore: decision.evaluationScore,
      depthReached: decision.depthReached,
      nodesEvaluated: decision.nodesEvaluated,
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  getSupportedDifficulties(): Difficulty[] {
    return [...DIFFICULTIES];
  }
}
