import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';

/** Lineup builds wait on Yahoo and Sleeper, so the bar is higher than a plain CRUD API */
const SLOW_REQUEST_MS = 3000;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const routePath: unknown = req.route?.path;
    const path = typeof routePath === 'string' ? routePath : req.path;
    const method = req.method;
    const status = res.statusCode;

    metrics.increment('http_requests_total');
    metrics.recordDuration('http_request_duration_ms', duration);

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', {
        method,
        path,
        status,
        durationMs: duration,
        requestId: req.requestId,
      });
    }
  });

  next();
}
