import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createServer } from 'http';

import { env } from './config/env.config';
import { logger } from './config/logger.config';
import { isAllowedOrigin, isAllowedDevOrigin } from './config/cors.config';
import { requestTimingMiddleware } from './middleware/request-timing.middleware';
import { requestIdMiddleware } from './middleware/request-id.middleware';
// Bootstrap DI container (auto-runs on import, must be before routes)
import './bootstrap';
import routes from './routes';
import { errorHandler } from './middleware/error.middleware';

const app = express();

// Trust proxy for correct IP detection behind load balancers/proxies
// Required for rate limiting to key on the client address
app.set('trust proxy', 1);

// CORS configuration
const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) return callback(null, true);

    // In development, allow local dev origins
    if (env.NODE_ENV !== 'production' && isAllowedDevOrigin(origin)) {
      return callback(null, true);
    }

    // Check against allowlist (FRONTEND_URL + FRONTEND_URLS)
    if (isAllowedOrigin(origin)) {
      return callback(null, true);
    }

    logger.warn('CORS rejected origin', { origin });
    return callback(new Error('Not allowed by CORS'));
  },
  methods: ['GET', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'x-request-id'],
};

// Middleware
app.use(
  helmet({
    // Disable contentSecurityPolicy for API server (no HTML served)
    contentSecurityPolicy: false,
    hidePoweredBy: true,
  })
);
app.use(cors(corsOptions));
app.use(express.json({ limit: '10kb' }));
app.use(requestIdMiddleware);
app.use(requestTimingMiddleware);

// Routes
app.use('/api', routes);

// Global error handler (must be last)
app.use(errorHandler);

const PORT = env.PORT;

const server = createServer(app);

server.listen(PORT, '0.0.0.0', () => {
  logger.info('Lineup advisor started', {
    port: PORT,
    healthCheck: `http://localhost:${PORT}/api/health`,
  });
});

// Graceful shutdown
let isShuttingDown = false;
const gracefulShutdown = () => {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info('Shutting down gracefully...');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGINT', gracefulShutdown);
process.on('SIGTERM', gracefulShutdown);

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  gracefulShutdown();
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: String(reason) });
  gracefulShutdown();
});
