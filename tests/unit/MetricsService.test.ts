/**
 * Unit tests for MetricsService.
 *
 * Covers the singleton and the HTTP, battle and opponent metrics as they
 * appear in the Prometheus exposition text.
 */

import client from 'prom-client';
import { MetricsService, getMetricsService } from '../../src/server/services/MetricsService';

describe('MetricsService', () => {
  beforeEach(() => {
    MetricsService.resetInstance();
    client.register.clear();
  });

  afterAll(() => {
    MetricsService.resetInstance();
    client.register.clear();
  });

  describe('Singleton Pattern', () => {
    it('should return the same instance on multiple calls', () => {
      expect(getMetricsService()).toBe(getMetricsService());
    });

    it('should create a fresh instance after reset', () => {
      const first = getMetricsService();
      MetricsService.resetInstance();
      expect(getMetricsService()).not.toBe(first);
    });
  });

  it('records HTTP requests by method, path and status', async () => {
    const metrics = getMetricsService();
    metrics.recordHttpRequest('POST', '/api/ai-battle/:gameId/move', 200, 0.02);

    const text = await metrics.getMetrics();
    expect(text).toContain(
      'http_requests_total{method="POST",path="/api/ai-battle/:gameId/move",status="200"} 1'
    );
  });

  it('records battle lifecycle metrics', async () => {
    const metrics = getMetricsService();
    metrics.recordBattleCreated('hard');
    metrics.recordBattleCreated('hard');
    metrics.setActiveBattles(2);
    metrics.recordBattlesEnded('idle', 2);
    metrics.recordBattlesEnded('deleted');
    metrics.recordBattlesEnded('deleted', 0);

    const text = await metrics.getMetrics();
    expect(text).toContain('reversi_battles_created_total{difficulty="hard"} 2');
    expect(text).toContain('reversi_battles_active 2');
    expect(text).toContain('reversi_battles_ended_total{reason="idle"} 2');
    expect(text).toContain('reversi_battles_ended_total{reason="deleted"} 1');
  });

  it('records moves and finished games', async () => {
    const metrics = getMetricsService();
    metrics.recordMove('human');
    metrics.recordMove('opponent');
    metrics.recordMove('opponent');
    metrics.recordGameFinished(null);
    metrics.recordGameFinished('black');

    const text = await metrics.getMetrics();
    expect(text).toContain('reversi_moves_total{source="human"} 1');
    expect(text).toContain('reversi_moves_total{source="opponent"} 2');
    expect(text).toContain('reversi_games_finished_total{winner="draw"} 1');
    expect(text).toContain('reversi_games_finished_total{winner="black"} 1');
  });

  it('records opponent outcomes, latency and retries', async () => {
    const metrics = getMetricsService();
    metrics.recordOpponentRequest('primary');
    metrics.recordOpponentRequest('error');
    metrics.recordOpponentRequest('secondary');
    metrics.recordOpponentLatency('LocalOpponentService', 'medium', 250);
    metrics.recordOpponentRetry();

    const text = await metrics.getMetrics();
    expect(text).toContain('reversi_opponent_requests_total{outcome="primary"} 1');
    expect(text).toContain('reversi_opponent_requests_total{outcome="secondary"} 1');
    expect(text).toContain('reversi_opponent_requests_total{outcome="error"} 1');
    expect(text).toContain(
      'reversi_opponent_request_duration_seconds_count{service="LocalOpponentService",difficulty="medium"} 1'
    );
    expect(text).toContain('reversi_opponent_retries_total 1');
  });

  it('reports the Prometheus content type', () => {
    expect(getMetricsService().getContentType()).toContain('text/plain');
  });
});
