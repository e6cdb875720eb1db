import cors, { CorsOptions } from 'cors';
import express, { Express } from 'express';
import { httpLogger } from '../middlewares/logger';
import { globalLimiter } from '../middlewares/rateLimiter';
import { securityHeaders } from '../middlewares/security';
import { createRoutes } from '../routes';
import { errorHandler, NotFoundError } from '../utils/errorHandler';
import { formatApiResponse } from '../utils/formatApiResponse';
import { AppContainer } from './container';

function corsOptions(allowedOrigins: string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Allow server-to-server (no Origin header) and an empty allow-list
      if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      return callback(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS', 'HEAD'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
    optionsSuccessStatus: 204,
    maxAge: 86400,
  };
}

export function createApp(container: AppContainer): Express {
  const app = express();
  const isProd = container.config.nodeEnv === 'production';
  app.set('trust proxy', isProd ? 1 : false);

  app.use(securityHeaders);
  app.use(cors(corsOptions(container.config.corsOrigins)));
  app.use(httpLogger);
  app.use(globalLimiter);
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json(
      formatApiResponse('success', 'OK', {
        uptime: process.uptime(),
        textProvider: container.textProvider.name,
        imageProvider: container.imageProvider.name,
        tasks: container.orchestrator.stats(),
        sessions: container.sessionStore.storyIds().length,
      })
    );
  });

  app.use('/api', createRoutes(container));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });
  app.use(errorHandler);

  return app;
}
