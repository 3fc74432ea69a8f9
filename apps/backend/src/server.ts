import type { Server } from 'http';
import { config } from './config/default.ts';
import { createApp } from './app.ts';
import { SERVER_SHUTDOWN } from './constants.ts';
import { runMigrations } from './migrations/startup.ts';
import { closeDatabase } from './utils/database.ts';
import { createChildLogger } from './utils/logging/logger.ts';

const serverLogger = createChildLogger('server');

let server: Server | undefined;

async function startServer(): Promise<void> {
  try {
    serverLogger.info(`Starting server in ${config.env} mode`);

    // Run database migrations first
    await runMigrations();

    const app = createApp();
    server = app.listen(config.server.port, () => {
      serverLogger.info(
        { port: config.server.port, publicUrl: config.server.publicUrl },
        'HTTP server listening',
      );
    });
  } catch (error) {
    serverLogger.error({ err: error }, 'Failed to start server');
    closeDatabase();
    process.exit(1);
  }
}

/**
 * Graceful shutdown: stop accepting connections, then release the database
 */
async function gracefulShutdown(signal: string): Promise<void> {
  serverLogger.info(`Received ${signal}, initiating graceful shutdown`);

  await new Promise<void>((resolve) => {
    if (!server) {
      resolve();
      return;
    }

    const timeout = setTimeout(() => {
      serverLogger.warn('Server close timeout, forcing exit');
      resolve();
    }, SERVER_SHUTDOWN.CLOSE_SERVER_TIMEOUT_MS);

    server.close(() => {
      clearTimeout(timeout);
      serverLogger.info('HTTP server closed');
      resolve();
    });
  });

  closeDatabase();
  serverLogger.info('Graceful shutdown complete');
  process.exit(0);
}

// Graceful shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

void startServer();
