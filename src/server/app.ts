import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { createBattleRouter } from './routes/battles';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { metricsMiddleware } from './middleware/metricsMiddleware';
import { errorMessage, logger } from './utils/logger';
import { getMetricsService } from './services/MetricsService';
import { BattleOrchestrator } from './game/BattleOrchestrator';
import { OpponentMovePolicy } from './game/OpponentMovePolicy';
import { SessionRegistry } from './game/SessionRegistry';
import { createOpponentService } from './game/ai/opponentServiceFactory';

export interface AppDependencies {
  orchestrator: BattleOrchestrator;
  corsOrigin: string;
  metricsEnabled: boolean;
  version: string;
}

export interface BattleServices {
  registry: SessionRegistry;
  policy: OpponentMovePolicy;
  orchestrator: BattleOrchestrator;
}

/**
 * Wire the registry, the opponent adapters and the orchestrator from config.
 *
 * @throws OpponentServiceError CONFIGURATION_ERROR for an unusable adapter setup
 */
export function createBattleServices(appConfig: AppConfig): BattleServices {
  const registry = new SessionRegistry({
    maxSessions: appConfig.battle.maxSessions,
    sessionTimeoutMs: appConfig.battle.sessionTimeoutMs,
  });

  const primary = createOpponentService(appConfig.opponent.primary);
  const secondary = appConfig.fallback.enabled
    ? createOpponentService(appConfig.opponent.fallback)
    : null;

  const policy = new OpponentMovePolicy(primary, secondary, {
    enableFallback: appConfig.fallback.enabled,
    maxAttempts: appConfig.fallback.maxAttempts,
    retryDelayMs: appConfig.fallback.retryDelayMs,
  });

  const orchestrator = new BattleOrchestrator(registry, policy, {
    defaultDifficulty: appConfig.battle.defaultDifficulty,
  });

  return { registry, policy, orchestrator };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: deps.corsOrigin === '*' ? true : deps.corsOrigin.split(',') }));
  app.use(requestContext);
  if (deps.metricsEnabled) {
    app.use(metricsMiddleware);
  }
  app.use(express.json({ limit: '100kb' }));

  /** Liveness: the process is up and serving requests. */
  app.get(['/health', '/healthz'], (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      version: deps.version,
      timestamp: new Date().toISOString(),
    });
  });

  /** Readiness: the primary opponent passes its health check. */
  app.get(['/ready', '/readyz'], async (_req: Request, res: Response) => {
    try {
      const opponent = await deps.orchestrator.checkReadiness();
      res.status(200).json({
        status: 'ready',
        opponent,
        sessions: deps.orchestrator.getStats(),
      });
    } catch (error) {
      logger.warn('Readiness check failed', { error: errorMessage(error) });
      res.status(503).json({
        status: 'not_ready',
        error: errorMessage(error),
      });
    }
  });

  if (deps.metricsEnabled) {
    app.get('/metrics', async (_req: Request, res: Response) => {
      const metricsService = getMetricsService();
      try {
        res.set('Content-Type', metricsService.getContentType());
        res.send(await metricsService.getMetrics());
      } catch (err) {
        logger.error('Failed to generate /metrics payload', { error: errorMessage(err) });
        res.status(500).send('metrics_unavailable');
      }
    });
  }

  app.use('/api/ai-battle', createBattleRouter(deps.orchestrator));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
