import { Request, Response, NextFunction } from 'express';
import { AppException, ErrorCode } from '../utils/exceptions';
import { metrics } from '../services/metrics.service';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

export const errorHandler = (
  err: Error | AppException,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  metrics.increment('errors_total');

  // Handle custom AppException instances
  if (err instanceof AppException) {
    metrics.increment(`errors_${err.errorCode.toLowerCase()}`);
    logger.warn('Application error', {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
      },
    });
  }

  // SECURITY: Only log full stack traces outside production to prevent
  // information leakage through log aggregation services
  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  };

  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }

  logger.error('Unexpected error', logPayload);

  return res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};
