import type { Difficulty, Player } from '../../shared/types/game';
import { createGameState } from '../../shared/engine/gameState';
import { GameNotFoundError, SessionLimitError } from '../../shared/errors/GameDomainErrors';
import { logger } from '../utils/logger';
import { getMetricsService } from '../services/MetricsService';
import { BattleSession, cloneSession } from './BattleSession';

export interface SessionRegistryOptions {
  maxSessions: number;
  sessionTimeoutMs: number;
  /** Clock override for tests. */
  now?: () => Date;
}

export interface SessionRegistryStats {
  totalSessions: number;
  maxSessions: number;
  aiThinkingCount: number;
  difficultyCounts: Record<Difficulty, number>;
}

const HUMAN_PLAYER: Player = 'black';
const OPPONENT_PLAYER: Player = 'white';

/**
 * In-memory store of live battles.
 *
 * Every method is synchronous, so on a single event loop each call is
 * atomic with respect to every other call. Reads hand out deep copies;
 * writes go through {@link update}.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, BattleSession>();
  private readonly maxSessions: number;
  private readonly sessionTimeoutMs: number;
  private readonly now: () => Date;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionRegistryOptions) {
    this.maxSessions = options.maxSessions;
    this.sessionTimeoutMs = options.sessionTimeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws SessionLimitError when `maxSessions` battles are live
   */
  create(difficulty: Difficulty): string {
    if (this.sessions.size >= this.maxSessions) {
      throw new SessionLimitError(this.maxSessions);
    }

    const gameState = createGameState();
    const now = this.now();
    this.sessions.set(gameState.id, {
      id: gameState.id,
      gameState,
      difficulty,
      humanPlayer: HUMAN_PLAYER,
      opponentPlayer: OPPONENT_PLAYER,
      aiThinking: false,
      createdAt: now,
      lastActivityAt: now,
      annotations: [],
    });
    const metrics = getMetricsService();
    metrics.recordBattleCreated(difficulty);
    metrics.setActiveBattles(this.sessions.size);

    logger.info('Battle session created', { gameId: gameState.id, difficulty });
    return gameState.id;
  }

  get(id: string): BattleSession {
    return cloneSession(this.require(id));
  }

  exists(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Replace the stored record with `session` and stamp its activity time.
   *
   * @throws GameNotFoundError when the session was removed since it was read
   */
  update(session: BattleSession): void {
    this.require(session.id);
    const stored = cloneSession(session);
    stored.lastActivityAt = this.now();
    this.sessions.set(session.id, stored);
  }

  remove(id: string): BattleSession {
    const session = this.require(id);
    this.sessions.delete(id);
    const metrics = getMetricsService();
    metrics.recordBattlesEnded('deleted');
    metrics.setActiveBattles(this.sessions.size);
    return session;
  }

  list(): BattleSession[] {
    return Array.from(this.sessions.values(), cloneSession);
  }

  count(): number {
    return this.sessions.size;
  }

  setThinking(id: string, thinking: boolean): void {
    const session = this.require(id);
    session.aiThinking = thinking;
  }

  isThinking(id: string): boolean {
    return this.require(id).aiThinking;
  }

  /**
   * Drop every session idle for longer than the configured timeout.
   *
   * @returns the number of sessions removed
   */
  sweepIdle(now: Date = this.now()): number {
    const cutoff = now.getTime() - this.sessionTimeoutMs;
    let removed = 0;

    for (const [id, session] of this.sessions) {
      if (session.lastActivityAt.getTime() < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }

    if (removed > 0) {
      const metrics = getMetricsService();
      metrics.recordBattlesEnded('idle', removed);
      metrics.setActiveBattles(this.sessions.size);
    }
    return removed;
  }

  getStats(): SessionRegistryStats {
    const difficultyCounts: Record<Difficulty, number> = { easy: 0, medium: 0, hard: 0 };
    let aiThinkingCount = 0;

    for (const session of this.sessions.values()) {
      difficultyCounts[session.difficulty]++;
      if (session.aiThinking) {
        aiThinkingCount++;
      }
    }

    return {
      totalSessions: this.sessions.size,
      maxSessions: this.maxSessions,
      aiThinkingCount,
      difficultyCounts,
    };
  }

  startIdleSweep(intervalMs: number): void {
    this.stopIdleSweep();
    this.sweepTimer = setInterval(() => {
      const removed = this.sweepIdle();
      if (removed > 0) {
        logger.info('Removed idle battle sessions', {
          removed,
          remaining: this.sessions.size,
        });
      }
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopIdleSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private require(id: string): BattleSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new GameNotFoundError(id);
    }
    return session;
  }
}
