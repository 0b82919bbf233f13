import { createServer as createHttpServer } from 'http';
import { getEnv } from './config/env.js';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';

const env = getEnv();
const app = createApp();
const httpServer = createHttpServer(app);

httpServer.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    logger.fatal({ port: env.PORT }, 'Port already in use');
  } else {
    logger.fatal({ error }, 'Server error');
  }
  process.exit(1);
});

httpServer.listen(env.PORT, '0.0.0.0', () => {
  logger.info({ port: env.PORT, environment: env.NODE_ENV, model: env.COMPLIANCE_MODEL }, 'Server started successfully and listening');
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason: reason instanceof Error ? reason : { reason: String(reason) } }, 'Unhandled promise rejection');
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error }, 'Uncaught exception - shutting down');
  process.exit(1);
});

let shuttingDown = false;

// Graceful shutdown: stop accepting connections, let open requests finish
function gracefulShutdown(signal: string): void {
  if (shuttingDown) {
    logger.warn('Shutdown already in progress, forcing exit');
    process.exit(1);
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  const forceExit = setTimeout(() => {
    logger.error('Shutdown timed out, forcing exit');
    process.exit(1);
  }, env.COMPLIANCE_DRAIN_GRACE_MS + 5000);
  forceExit.unref();

  httpServer.close((error) => {
    if (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
