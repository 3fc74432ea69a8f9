import type { IncomingMessage, ServerResponse } from 'http';
import express from 'express';
import type { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import { toNodeHandler } from 'better-auth/node';
import { config } from './config/default.ts';
import { auth } from './lib/auth.ts';
import { errorHandler } from './middleware/errorHandler.ts';
import * as routes from './routes/index.ts';
import { logger } from './utils/logging/logger.ts';

// Api prefix
const API_PREFIX = '/api';

/**
 * Build the Express application. Startup work (migrations, listening)
 * lives in server.ts so tests can drive the app through supertest.
 */
export function createApp(): Application {
  const app: Application = express();

  // HTTP request logging middleware (using pino-http)
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req: IncomingMessage): boolean =>
          !!req.url?.includes(`${API_PREFIX}/status`),
      },
      customLogLevel: function (
        _req: IncomingMessage,
        res: ServerResponse,
        err?: Error,
      ) {
        if (res.statusCode >= 500 || err) {
          return 'error';
        } else if (res.statusCode === 401 || res.statusCode === 403) {
          return 'warn'; // Authentication/authorization issues are worth warning about
        } else if (res.statusCode >= 300 && res.statusCode < 400) {
          return 'silent';
        }
        // Successful requests and expected client errors
        return 'debug';
      },
    }),
  );

  app.use(helmet());
  app.use(
    cors({
      origin: config.server.corsOrigins,
      exposedHeaders: ['Content-Disposition'],
    }),
  );
  app.set('trust proxy', 1);

  // Better Auth parses its own bodies, so it is mounted before express.json()
  app.all(`${API_PREFIX}/auth/*splat`, toNodeHandler(auth));

  app.use(express.json());

  app.use(`${API_PREFIX}/status`, routes.statusRoutes);
  app.use(API_PREFIX, routes.authRoutes);
  app.use(API_PREFIX, routes.userRoutes);
  app.use(`${API_PREFIX}/teams`, routes.teamRoutes);

  app.use(API_PREFIX, (_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use(errorHandler);

  return app;
}
