import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { RequestContext as LoggerRequestContext, runWithContext } from '../utils/logger';

/**
 * Express.Request augmentation so that req.requestId is available
 * throughout the codebase without additional casting.
 */
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Per-request correlation:
 * - takes the id from X-Request-Id, or generates one
 * - echoes it back in the X-Request-Id response header
 * - runs the rest of the chain inside an AsyncLocalStorage context so every
 *   log line carries it
 */
export const requestContext = (req: Request, res: Response, next: NextFunction): void => {
  const headerId = (req.header('x-request-id') || '').trim();
  const requestId = headerId.length > 0 ? headerId : uuidv4();

  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const context: LoggerRequestContext = {
    requestId,
    method: req.method,
    path: req.path,
    startTime: Date.now(),
  };

  runWithContext(context, () => {
    next();
  });
};
