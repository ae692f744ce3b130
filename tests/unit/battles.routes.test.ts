/**
 * HTTP tests for the battle API mounted at /api/ai-battle, plus the
 * health, readiness and metrics endpoints.
 */

import request from 'supertest';
import client from 'prom-client';
import type { Express } from 'express';
import { createApp } from '../../src/server/app';
import { BattleOrchestrator } from '../../src/server/game/BattleOrchestrator';
import { OpponentMovePolicy } from '../../src/server/game/OpponentMovePolicy';
import { SessionRegistry } from '../../src/server/game/SessionRegistry';
import { MockOpponentService } from '../../src/server/game/ai/MockOpponentService';
import { MetricsService } from '../../src/server/services/MetricsService';

jest.mock('../../src/server/utils/logger', () => {
  const actual = jest.requireActual<typeof import('../../src/server/utils/logger')>(
    '../../src/server/utils/logger'
  );
  return {
    ...actual,
    logger: {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    },
  };
});

const BASE = '/api/ai-battle';
const UNKNOWN_ID = '3f2504e0-4f89-41d3-9a0c-0305e82c3301';

function buildApp(opponent: MockOpponentService = MockOpponentService.fast()): Express {
  const registry = new SessionRegistry({ maxSessions: 2, sessionTimeoutMs: 60_000 });
  const policy = new OpponentMovePolicy(opponent, null, {
    enableFallback: false,
    maxAttempts: 1,
    retryDelayMs: 0,
  });
  const orchestrator = new BattleOrchestrator(registry, policy, { defaultDifficulty: 'easy' });
  return createApp({ orchestrator, corsOrigin: '*', metricsEnabled: true, version: '1.2.3' });
}

async function createBattle(app: Express, body: object = {}): Promise<string> {
  const res = await request(app).post(BASE).send(body).expect(201);
  return res.body.data.gameId;
}

describe('battle routes', () => {
  let app: Express;

  beforeEach(() => {
    MetricsService.resetInstance();
    client.register.clear();
    app = buildApp();
  });

  describe('POST /', () => {
    it('creates a battle with the default difficulty', async () => {
      const res = await request(app).post(BASE).send({}).expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.message).toBe('Battle created');
      expect(res.body.data.difficulty).toBe('easy');
      expect(res.body.data.currentPlayer).toBe('black');
      expect(res.body.data.blackCount).toBe(2);
      expect(res.body.data.validMoves).toHaveLength(4);
    });

    it('normalises the requested difficulty', async () => {
      const res = await request(app).post(BASE).send({ difficulty: ' HARD ' }).expect(201);
      expect(res.body.data.difficulty).toBe('hard');
    });

    it('rejects an unknown difficulty', async () => {
      const res = await request(app).post(BASE).send({ difficulty: 'extreme' }).expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('INVALID_DIFFICULTY');
      expect(res.body.error.message).toBe('Invalid difficulty: extreme');
    });

    it('answers 429 once the session limit is reached', async () => {
      await createBattle(app);
      await createBattle(app);

      const res = await request(app).post(BASE).send({}).expect(429);
      expect(res.body.error.code).toBe('SESSION_LIMIT_REACHED');
      expect(res.body.error.message).toBe('Maximum number of sessions reached (2)');
    });

    it('accepts a new battle after one is deleted', async () => {
      const first = await createBattle(app);
      await createBattle(app);
      await request(app).post(BASE).send({}).expect(429);

      await request(app).delete(`${BASE}/${first}`).expect(204);

      await request(app).post(BASE).send({}).expect(201);
      const res = await request(app).get(`${BASE}/status`).expect(200);
      expect(res.body.data.sessions.totalSessions).toBe(2);
    });

    it('rejects a malformed JSON body', async () => {
      const res = await request(app)
        .post(BASE)
        .set('Content-Type', 'application/json')
        .send('{"difficulty":')
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('Malformed JSON body');
    });
  });

  describe('GET /:gameId', () => {
    it('returns the battle view', async () => {
      const gameId = await createBattle(app, { difficulty: 'medium' });

      const res = await request(app).get(`${BASE}/${gameId}`).expect(200);
      expect(res.body.data.gameId).toBe(gameId);
      expect(res.body.data.difficulty).toBe('medium');
      expect(res.body.data.status).toBe('in_progress');
    });

    it('answers 404 for an unknown battle', async () => {
      const res = await request(app).get(`${BASE}/${UNKNOWN_ID}`).expect(404);
      expect(res.body.error.code).toBe('GAME_NOT_FOUND');
      expect(res.body.error.message).toBe(`Game not found: ${UNKNOWN_ID}`);
    });

    it('rejects an id that is not a UUID', async () => {
      const res = await request(app).get(`${BASE}/not-a-uuid`).expect(400);
      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('gameId: gameId must be a UUID');
    });
  });

  describe('POST /:gameId/move', () => {
    it('plays the move and the opponent reply', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).post(`${BASE}/${gameId}/move`).send({ row: 2, col: 3 }).expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.playerMove).toEqual({ row: 2, col: 3 });
      expect(res.body.data.aiMove).toEqual({ row: 2, col: 2 });
      expect(res.body.data.gameState.blackCount).toBe(3);
      expect(res.body.data.gameState.whiteCount).toBe(3);
    });

    it('rejects coordinates off the board', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).post(`${BASE}/${gameId}/move`).send({ row: 9, col: 0 }).expect(400);
      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('row: row must be between 0 and 7');
    });

    it('rejects an illegal placement', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).post(`${BASE}/${gameId}/move`).send({ row: 0, col: 0 }).expect(400);
      expect(res.body.error.code).toBe('MOVE_INVALID');
      expect(res.body.error.message).toBe('Position (0, 0) is not a valid move for black');
    });

    it('answers 500 when the opponent fails and keeps the human move', async () => {
      app = buildApp(MockOpponentService.failing('engine crashed'));
      const gameId = await createBattle(app);

      const res = await request(app).post(`${BASE}/${gameId}/move`).send({ row: 2, col: 3 }).expect(500);
      expect(res.body.error.code).toBe('AI_THINKING_FAILED');
      expect(res.body.error.message).toBe(
        'Opponent failed to produce a move after 1 attempt(s): engine crashed'
      );

      const view = await request(app).get(`${BASE}/${gameId}`).expect(200);
      expect(view.body.data.moveCount).toBe(1);
      expect(view.body.data.currentPlayer).toBe('white');
      expect(view.body.data.aiThinking).toBe(false);
    });
  });

  describe('POST /:gameId/opponent-move', () => {
    it('answers 403 when the human is to move', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).post(`${BASE}/${gameId}/opponent-move`).expect(403);
      expect(res.body.error.code).toBe('MOVE_NOT_YOUR_TURN');
    });

    it('plays the pending reply after a failure', async () => {
      const opponent = MockOpponentService.failing('engine crashed');
      app = buildApp(opponent);
      const gameId = await createBattle(app);
      await request(app).post(`${BASE}/${gameId}/move`).send({ row: 2, col: 3 }).expect(500);

      opponent.updateConfig({ shouldError: false });
      const res = await request(app).post(`${BASE}/${gameId}/opponent-move`).expect(200);

      expect(res.body.data.playerMove).toBeNull();
      expect(res.body.data.aiMove).toEqual({ row: 2, col: 2 });
    });
  });

  describe('other battle endpoints', () => {
    it('changes the difficulty', async () => {
      const gameId = await createBattle(app);

      const res = await request(app)
        .put(`${BASE}/${gameId}/difficulty`)
        .send({ difficulty: 'medium' })
        .expect(200);
      expect(res.body.data.difficulty).toBe('medium');
    });

    it('requires a difficulty in the body', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).put(`${BASE}/${gameId}/difficulty`).send({}).expect(400);
      expect(res.body.error.message).toBe('difficulty: difficulty is required');
    });

    it('returns the move history', async () => {
      const gameId = await createBattle(app);
      await request(app).post(`${BASE}/${gameId}/move`).send({ row: 2, col: 3 }).expect(200);

      const res = await request(app).get(`${BASE}/${gameId}/history`).expect(200);
      expect(res.body.data.gameId).toBe(gameId);
      expect(res.body.data.totalMoves).toBe(2);
      expect(res.body.data.moves[0]).toMatchObject({
        moveNumber: 1,
        player: 'black',
        position: { row: 2, col: 3 },
        flipped: [{ row: 3, col: 3 }],
      });
    });

    it('deletes a battle', async () => {
      const gameId = await createBattle(app);

      await request(app).delete(`${BASE}/${gameId}`).expect(204);
      await request(app).get(`${BASE}/${gameId}`).expect(404);
    });

    it('lists sessions', async () => {
      const gameId = await createBattle(app);

      const res = await request(app).get(`${BASE}/sessions`).expect(200);
      expect(res.body.data.totalCount).toBe(1);
      expect(res.body.data.sessions[0]).toMatchObject({
        gameId,
        difficulty: 'easy',
        status: 'in_progress',
        moveCount: 0,
      });
    });

    it('lists difficulties', async () => {
      const res = await request(app).get(`${BASE}/difficulties`).expect(200);
      expect(res.body.data.difficulties.map((d: { value: string }) => d.value)).toEqual([
        'easy',
        'medium',
        'hard',
      ]);
    });

    it('reports service status', async () => {
      await createBattle(app, { difficulty: 'hard' });

      const res = await request(app).get(`${BASE}/status`).expect(200);
      expect(res.body.data.primary).toEqual({ name: 'MockOpponentService', kind: 'mock', available: true });
      expect(res.body.data.fallbackEnabled).toBe(false);
      expect(res.body.data.sessions.difficultyCounts).toEqual({ easy: 0, medium: 0, hard: 1 });
    });
  });

  describe('infrastructure endpoints', () => {
    it('reports liveness', async () => {
      const res = await request(app).get('/health').expect(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.version).toBe('1.2.3');
    });

    it('reports readiness from the primary opponent', async () => {
      const res = await request(app).get('/ready').expect(200);
      expect(res.body.status).toBe('ready');
      expect(res.body.opponent.name).toBe('MockOpponentService');
    });

    it('answers 503 when the primary opponent is down', async () => {
      app = buildApp(MockOpponentService.unavailable());

      const res = await request(app).get('/ready').expect(503);
      expect(res.body).toEqual({
        status: 'not_ready',
        error: 'MockOpponentService: Service health check failed',
      });
    });

    it('exposes Prometheus metrics', async () => {
      await createBattle(app, { difficulty: 'medium' });

      const res = await request(app).get('/metrics').expect(200);
      expect(res.text).toContain('reversi_battles_created_total{difficulty="medium"} 1');
      expect(res.text).toContain('reversi_battles_active 1');
    });

    it('echoes the request id and carries it into error envelopes', async () => {
      const res = await request(app).get('/nope').set('X-Request-Id', 'req-123').expect(404);

      expect(res.headers['x-request-id']).toBe('req-123');
      expect(res.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'Route /nope not found',
        requestId: 'req-123',
      });
    });
  });
});
