import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

const REQUEST_ID_FORMAT = /^[a-zA-Z0-9-]{1,128}$/;

/**
 * Request ID middleware for log correlation
 * - Accepts X-Request-ID from client when it is a short alphanumeric token
 * - Generates new UUID otherwise
 * - Returns requestId in response header
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const clientId = req.header('x-request-id');
  const requestId = clientId && REQUEST_ID_FORMAT.test(clientId) ? clientId : randomUUID();

  req.requestId = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}
