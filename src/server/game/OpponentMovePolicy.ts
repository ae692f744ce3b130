import type { Difficulty, GameState } from '../../shared/types/game';
import { OpponentThinkingError } from '../../shared/errors/GameDomainErrors';
import { delay } from '../../shared/utils/timeout';
import { errorMessage, logger } from '../utils/logger';
import { getMetricsService } from '../services/MetricsService';
import type { OpponentMoveResult, OpponentService } from './ai/OpponentService';

export interface FallbackPolicyOptions {
  enableFallback: boolean;
  /** Rounds of primary (then secondary) attempts before giving up. */
  maxAttempts: number;
  retryDelayMs: number;
}

export type OpponentMoveSource = 'primary' | 'secondary';

export interface PolicyMoveResult extends OpponentMoveResult {
  source: OpponentMoveSource;
  serviceName: string;
  /** 1-based round that produced the move. */
  attempt: number;
}

/**
 * Obtains an opponent move from a primary adapter, falling back to a
 * secondary one and retrying with a fixed back-off.
 */
export class OpponentMovePolicy {
  constructor(
    private readonly primary: OpponentService,
    private readonly secondary: OpponentService | null,
    private readonly options: FallbackPolicyOptions
  ) {}

  getPrimary(): OpponentService {
    return this.primary;
  }

  getSecondary(): OpponentService | null {
    return this.secondary;
  }

  isFallbackEnabled(): boolean {
    return this.options.enableFallback && this.secondary !== null;
  }

  /**
   * @throws OpponentThinkingError once every round has failed
   */
  async requestMove(state: GameState, difficulty: Difficulty): Promise<PolicyMoveResult> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    const metrics = getMetricsService();
    let lastError = 'no attempt made';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const candidates: Array<[OpponentMoveSource, OpponentService]> = [['primary', this.primary]];
      // The secondary is only consulted while another round remains.
      if (this.options.enableFallback && this.secondary && attempt < maxAttempts) {
        candidates.push(['secondary', this.secondary]);
      }

      for (const [source, service] of candidates) {
        const start = performance.now();
        try {
          const result = await service.calculateMove(state, difficulty);
          metrics.recordOpponentRequest(source);
          metrics.recordOpponentLatency(service.name, difficulty, performance.now() - start);
          if (source === 'secondary') {
            logger.info('Opponent move obtained from fallback service', {
              gameId: state.id,
              service: service.name,
              attempt,
            });
          }
          return { ...result, source, serviceName: service.name, attempt };
        } catch (error) {
          lastError = errorMessage(error);
          metrics.recordOpponentRequest('error');
          logger.warn('Opponent move attempt failed', {
            gameId: state.id,
            service: service.name,
            source,
            attempt,
            maxAttempts,
            error: lastError,
          });
        }
      }

      if (attempt < maxAttempts) {
        metrics.recordOpponentRetry();
        await delay(this.options.retryDelayMs);
      }
    }

    logger.error('Opponent failed to produce a move', {
      gameId: state.id,
      attempts: maxAttempts,
      lastError,
    });
    throw new OpponentThinkingError(lastError, maxAttempts, { gameId: state.id, difficulty });
  }
}
