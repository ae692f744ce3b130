/**
 * MetricsService - Centralized Prometheus metrics collection.
 *
 * This service provides:
 * - HTTP request metrics (duration, total)
 * - Battle metrics (sessions created/active/swept, moves applied)
 * - Opponent metrics (requests by outcome, latency, retries)
 *
 * All metrics are registered with the default prom-client registry and
 * exposed via the /metrics endpoint for Prometheus scraping.
 */

import client, { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { Difficulty } from '../../shared/types/game';

/**
 * Which side produced a move: the human player or the computer opponent.
 */
export type MoveSource = 'human' | 'opponent';

/**
 * Opponent request outcome.
 * - primary / secondary: a move was obtained from that adapter
 * - error: the attempt failed
 */
export type OpponentOutcome = 'primary' | 'secondary' | 'error';

export type SessionEndReason = 'deleted' | 'idle';

/**
 * Singleton MetricsService class that manages all Prometheus metrics.
 */
export class MetricsService {
  private static instance: MetricsService | null = null;
  private readonly registry: Registry;

  // ===================
  // HTTP Request Metrics
  // ===================

  /** Histogram: HTTP request duration in seconds */
  public readonly httpRequestDuration: Histogram<'method' | 'path' | 'status'>;

  /** Counter: Total HTTP requests */
  public readonly httpRequestsTotal: Counter<'method' | 'path' | 'status'>;

  // ===================
  // Battle Metrics
  // ===================

  /** Counter: Battles created by difficulty */
  public readonly battlesCreatedTotal: Counter<'difficulty'>;

  /** Counter: Battles removed by reason */
  public readonly battlesEndedTotal: Counter<'reason'>;

  /** Gauge: Live battles held by the registry */
  public readonly battlesActive: Gauge<string>;

  /** Counter: Moves applied by source */
  public readonly movesTotal: Counter<'source'>;

  /** Counter: Games that reached a terminal position, by winner */
  public readonly gamesFinishedTotal: Counter<'winner'>;

  // ===================
  // Opponent Metrics
  // ===================

  /** Counter: Opponent move requests by outcome */
  public readonly opponentRequestsTotal: Counter<'outcome'>;

  /** Histogram: Time to obtain an opponent move in seconds */
  public readonly opponentRequestDuration: Histogram<'service' | 'difficulty'>;

  /** Counter: Retries after a failed attempt round */
  public readonly opponentRetriesTotal: Counter<string>;

  private constructor() {
    this.registry = client.register;

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'path', 'status'] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    });

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'path', 'status'] as const,
    });

    this.battlesCreatedTotal = new Counter({
      name: 'reversi_battles_created_total',
      help: 'Total number of battles created by difficulty',
      labelNames: ['difficulty'] as const,
    });

    this.battlesEndedTotal = new Counter({
      name: 'reversi_battles_ended_total',
      help: 'Total number of battles removed from the registry by reason',
      labelNames: ['reason'] as const,
    });

    this.battlesActive = new Gauge({
      name: 'reversi_battles_active',
      help: 'Number of live battles',
    });

    this.movesTotal = new Counter({
      name: 'reversi_moves_total',
      help: 'Total number of moves applied by source',
      labelNames: ['source'] as const,
    });

    this.gamesFinishedTotal = new Counter({
      name: 'reversi_games_finished_total',
      help: 'Total number of finished games by winner',
      labelNames: ['winner'] as const,
    });

    this.opponentRequestsTotal = new Counter({
      name: 'reversi_opponent_requests_total',
      help: 'Total opponent move requests by outcome',
      labelNames: ['outcome'] as const,
    });

    this.opponentRequestDuration = new Histogram({
      name: 'reversi_opponent_request_duration_seconds',
      help: 'Duration of successful opponent move requests in seconds',
      labelNames: ['service', 'difficulty'] as const,
      buckets: [0.001, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 4, 8],
    });

    this.opponentRetriesTotal = new Counter({
      name: 'reversi_opponent_retries_total',
      help: 'Total number of opponent retry rounds after a failed attempt',
    });
  }

  public static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Reset the singleton instance (for testing only).
   */
  public static resetInstance(): void {
    if (MetricsService.instance) {
      client.register.clear();
      MetricsService.instance = null;
    }
  }

  /**
   * Get metrics in Prometheus text format.
   */
  public getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }

  public recordHttpRequest(method: string, path: string, status: number, durationSeconds: number): void {
    const labels = { method, path, status: String(status) };
    this.httpRequestDuration.observe(labels, durationSeconds);
    this.httpRequestsTotal.inc(labels);
  }

  public recordBattleCreated(difficulty: Difficulty): void {
    this.battlesCreatedTotal.inc({ difficulty });
  }

  public recordBattlesEnded(reason: SessionEndReason, count: number = 1): void {
    if (count > 0) {
      this.battlesEndedTotal.inc({ reason }, count);
    }
  }

  public setActiveBattles(count: number): void {
    this.battlesActive.set(count);
  }

  public recordMove(source: MoveSource): void {
    this.movesTotal.inc({ source });
  }

  public recordGameFinished(winner: string | null): void {
    this.gamesFinishedTotal.inc({ winner: winner ?? 'draw' });
  }

  public recordOpponentRequest(outcome: OpponentOutcome): void {
    this.opponentRequestsTotal.inc({ outcome });
  }

  public recordOpponentLatency(service: string, difficulty: Difficulty, durationMs: number): void {
    this.opponentRequestDuration.observe({ service, difficulty }, durationMs / 1000);
  }

  public recordOpponentRetry(): void {
    this.opponentRetriesTotal.inc();
  }
}

/**
 * Convenience accessor for the MetricsService singleton.
 */
export const getMetricsService = (): MetricsService => MetricsService.getInstance();

export default MetricsService;
