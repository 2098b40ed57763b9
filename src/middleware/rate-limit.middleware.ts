import rateLimit from 'express-rate-limit';
import { Request } from 'express';

/**
 * Rate limiter for lineup builds.
 * Each build fans out to several Yahoo and Sleeper requests, so keep it tight:
 * 20 builds per minute per client.
 */
export const lineupBuildLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: {
    error: { code: 'RATE_LIMITED', message: 'Too many lineup requests, please slow down' },
  },
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
});

/**
 * Rate limiter for read-through endpoints (matchup, compare)
 * Limits to 60 requests per minute per client
 */
export const apiReadLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 60,
  message: {
    error: { code: 'RATE_LIMITED', message: 'Too many requests, please slow down' },
  },
  keyGenerator: (req: Request) => req.ip || 'unknown',
  standardHeaders: true,
  legacyHeaders: false,
});
