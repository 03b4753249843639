import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createSourcesRouter } from './controllers/sources/sources.controller.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import type { SourceRegistry } from './services/sources/source-registry.js';

export interface AppDependencies {
  registry: SourceRegistry;
}

export function createApp({ registry }: AppDependencies) {
  const app = express();
  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));
  app.use(cors());

  // Request context & logging (before routes)
  app.use(requestContextMiddleware);
  app.use(httpLoggingMiddleware);

  app.use('/api/v1', createSourcesRouter(registry));

  app.get('/healthz', (_req, res) => res.status(200).send('ok'));

  // Must stay last
  app.use(errorMiddleware);

  return app;
}
