import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger, withRequestContext } from '../utils/logger';
import { isGameError } from '../../shared/errors/GameDomainErrors';
import { config } from '../config';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
  /** Set by body-parser on malformed JSON. */
  type?: string;
}

export interface ErrorEnvelope {
  success: false;
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    stack?: string;
  };
}

export const errorHandler = (error: AppError, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = error.statusCode || 500;
  let message = error.message || 'Internal Server Error';
  let code = error.code || 'INTERNAL_ERROR';

  if (isGameError(error)) {
    statusCode = error.httpStatus;
    code = error.code;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    // Use the first issue message when available, fall back to generic message
    if (error.issues.length > 0) {
      const [issue] = error.issues;
      const field = issue.path.join('.');
      message = field ? `${field}: ${issue.message}` : issue.message;
    }
  } else if (error.type === 'entity.parse.failed') {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    message = 'Malformed JSON body';
  }

  if (statusCode >= 500) {
    logger.error(
      'Server Error:',
      withRequestContext(req, {
        error: error.message,
        code,
        stack: error.stack,
        url: req.url,
        method: req.method,
      })
    );
  } else {
    logger.warn(
      'Client Error:',
      withRequestContext(req, {
        error: message,
        code,
        url: req.url,
        method: req.method,
        statusCode,
      })
    );
  }

  const envelope: ErrorEnvelope = {
    success: false,
    error: {
      code,
      message,
      timestamp: new Date().toISOString(),
    },
  };
  if (req.requestId) {
    envelope.error.requestId = req.requestId;
  }
  if (config.isDevelopment && statusCode >= 500 && error.stack) {
    envelope.error.stack = error.stack;
  }

  res.status(statusCode).json(envelope);
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  if (code) {
    error.code = code;
  }
  error.isOperational = true;
  return error;
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(`Route ${req.originalUrl} not found`, 404, 'NOT_FOUND'));
};
