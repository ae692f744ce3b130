import { createServer } from 'http';
import client from 'prom-client';
import { config } from './config';
import { createApp, createBattleServices } from './app';
import { errorMessage, logger } from './utils/logger';

const services = createBattleServicesOrExit();

if (config.metrics.enabled) {
  // Default Node.js process metrics alongside the battle metrics.
  client.collectDefaultMetrics();
}

const app = createApp({
  orchestrator: services.orchestrator,
  corsOrigin: config.server.corsOrigin,
  metricsEnabled: config.metrics.enabled,
  version: config.app.version,
});
const server = createServer(app);

function createBattleServicesOrExit() {
  try {
    return createBattleServices(config);
  } catch (error) {
    logger.error('Failed to configure opponent services', { error: errorMessage(error) });
    process.exit(1);
  }
}

function startServer(): void {
  const { port, host } = config.server;

  if (config.battle.enableSessionCleanup) {
    services.registry.startIdleSweep(config.battle.cleanupIntervalMs);
  }

  server.listen(port, host, () => {
    logger.info(`Server running on ${host}:${port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info('Opponent services configured', {
      primary: config.opponent.primary.kind,
      fallback: config.fallback.enabled ? config.opponent.fallback.kind : 'disabled',
      maxSessions: config.battle.maxSessions,
      fastMode: config.opponent.primary.fastMode,
    });
  });

  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

function gracefulShutdown(signal: string): void {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);
  services.registry.stopIdleSweep();

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force close after 30 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 30000).unref();
}

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

startServer();

export { app, server };
