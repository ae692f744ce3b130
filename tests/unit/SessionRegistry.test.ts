import client from 'prom-client';
import { SessionRegistry } from '../../src/server/game/SessionRegistry';
import { MetricsService, getMetricsService } from '../../src/server/services/MetricsService';
import { applyMove } from '../../src/shared/engine/moveResolution';
import { GameNotFoundError, SessionLimitError } from '../../src/shared/errors/GameDomainErrors';
import { pos } from '../utils/fixtures';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const MINUTE_MS = 60_000;

describe('SessionRegistry', () => {
  let clock: Date;
  let registry: SessionRegistry;

  beforeEach(() => {
    MetricsService.resetInstance();
    client.register.clear();
    clock = new Date('2026-01-01T00:00:00.000Z');
    registry = new SessionRegistry({
      maxSessions: 2,
      sessionTimeoutMs: 30 * MINUTE_MS,
      now: () => clock,
    });
  });

  afterEach(() => {
    registry.stopIdleSweep();
  });

  it('creates battles with the human on black', () => {
    const id = registry.create('medium');
    const session = registry.get(id);

    expect(session.id).toBe(id);
    expect(session.gameState.id).toBe(id);
    expect(session.humanPlayer).toBe('black');
    expect(session.opponentPlayer).toBe('white');
    expect(session.difficulty).toBe('medium');
    expect(session.aiThinking).toBe(false);
    expect(session.createdAt).toEqual(clock);
    expect(registry.count()).toBe(1);
  });

  it('enforces the session limit', () => {
    registry.create('easy');
    registry.create('easy');

    expect(() => registry.create('easy')).toThrow(SessionLimitError);
    expect(() => registry.create('easy')).toThrow('Maximum number of sessions reached (2)');
    expect(registry.count()).toBe(2);
  });

  it('admits a new battle once a slot is freed', () => {
    const first = registry.create('easy');
    registry.create('easy');
    expect(() => registry.create('easy')).toThrow(SessionLimitError);

    registry.remove(first);
    const replacement = registry.create('hard');

    expect(registry.exists(replacement)).toBe(true);
    expect(registry.exists(first)).toBe(false);
    expect(registry.count()).toBe(2);
  });

  it('hands out copies that do not alias the stored record', () => {
    const id = registry.create('easy');
    const copy = registry.get(id);
    applyMove(copy.gameState, pos(2, 3));
    copy.difficulty = 'hard';

    const stored = registry.get(id);
    expect(stored.gameState.moveHistory).toHaveLength(0);
    expect(stored.difficulty).toBe('easy');
  });

  it('writes updates back and stamps the activity time', () => {
    const id = registry.create('easy');
    const copy = registry.get(id);
    applyMove(copy.gameState, pos(2, 3));

    clock = new Date('2026-01-01T00:05:00.000Z');
    registry.update(copy);

    const stored = registry.get(id);
    expect(stored.gameState.moveHistory).toHaveLength(1);
    expect(stored.lastActivityAt.toISOString()).toBe('2026-01-01T00:05:00.000Z');
    expect(stored.createdAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  it('refuses to update or read a removed battle', () => {
    const id = registry.create('easy');
    const copy = registry.get(id);
    registry.remove(id);

    expect(registry.exists(id)).toBe(false);
    expect(() => registry.update(copy)).toThrow(GameNotFoundError);
    expect(() => registry.get(id)).toThrow(`Game not found: ${id}`);
    expect(() => registry.remove(id)).toThrow(GameNotFoundError);
  });

  it('tracks the thinking flag', () => {
    const id = registry.create('hard');
    registry.setThinking(id, true);

    expect(registry.isThinking(id)).toBe(true);
    expect(registry.get(id).aiThinking).toBe(true);
    expect(registry.getStats()).toEqual({
      totalSessions: 1,
      maxSessions: 2,
      aiThinkingCount: 1,
      difficultyCounts: { easy: 0, medium: 0, hard: 1 },
    });
  });

  it('sweeps only battles idle past the timeout', () => {
    const stale = registry.create('easy');
    clock = new Date('2026-01-01T00:20:00.000Z');
    const fresh = registry.create('medium');

    // 31 minutes after the first battle, 11 after the second.
    const removed = registry.sweepIdle(new Date('2026-01-01T00:31:00.000Z'));

    expect(removed).toBe(1);
    expect(registry.exists(stale)).toBe(false);
    expect(registry.exists(fresh)).toBe(true);
  });

  it('keeps a battle idle for exactly the timeout', () => {
    const id = registry.create('easy');

    expect(registry.sweepIdle(new Date('2026-01-01T00:30:00.000Z'))).toBe(0);
    expect(registry.exists(id)).toBe(true);
  });

  it('records the lifecycle of every battle in metrics', async () => {
    const deleted = registry.create('easy');
    registry.create('hard');
    registry.remove(deleted);
    registry.sweepIdle(new Date('2026-01-01T00:31:00.000Z'));

    const text = await getMetricsService().getMetrics();
    expect(text).toContain('reversi_battles_created_total{difficulty="easy"} 1');
    expect(text).toContain('reversi_battles_created_total{difficulty="hard"} 1');
    expect(text).toContain('reversi_battles_ended_total{reason="deleted"} 1');
    expect(text).toContain('reversi_battles_ended_total{reason="idle"} 1');
    expect(text).toContain('reversi_battles_active 0');
  });

  it('lists every battle', () => {
    const a = registry.create('easy');
    const b = registry.create('hard');

    expect(registry.list().map((s) => s.id).sort()).toEqual([a, b].sort());
  });

  it('runs the sweep on an interval', () => {
    jest.useFakeTimers();
    try {
      const id = registry.create('easy');
      clock = new Date('2026-01-01T01:00:00.000Z');

      registry.startIdleSweep(MINUTE_MS);
      jest.advanceTimersByTime(MINUTE_MS);

      expect(registry.exists(id)).toBe(false);
    } finally {
      registry.stopIdleSweep();
      jest.useRealTimers();
    }
  });
});
