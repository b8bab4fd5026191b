import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { defaultCredentials } from '@/config/dependencies';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

let server: Server | undefined;

function startServer(): void {
  if (env.USE_LIVE_DATA && !defaultCredentials) {
    logger.warn('USE_LIVE_DATA is set but KIS_APP_KEY/KIS_APP_SECRET are empty; requests without credentials get fallback data');
  }

  server = app.listen(env.PORT, () => {
    logger.info(
      {
        port: env.PORT,
        env: env.NODE_ENV,
        liveByDefault: env.USE_LIVE_DATA,
      },
      `Server running on http://localhost:${env.PORT}`
    );
    logger.info(`API endpoints available at http://localhost:${env.PORT}/api`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal(`Port ${env.PORT} is already in use`);
    } else {
      logger.fatal({ error }, 'Server error');
    }
    process.exit(1);
  });
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds (in-flight live fetches are bounded by the KIS timeout)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

startServer();
