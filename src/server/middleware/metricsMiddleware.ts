import { Request, Response, NextFunction } from 'express';
import { getMetricsService } from '../services/MetricsService';

/**
 * Route template for the metrics label, e.g. `/api/ai-battle/:gameId/move`.
 * Unmatched requests share one label to keep cardinality bounded.
 */
function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route) {
    const { path } = route;
    if (typeof path === 'string') {
      return `${req.baseUrl}${path}`;
    }
  }
  return 'unmatched';
}

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationSeconds = Number(process.hrtime.bigint() - start) / 1e9;
    getMetricsService().recordHttpRequest(req.method, routeLabel(req), res.statusCode, durationSeconds);
  });

  next();
};
