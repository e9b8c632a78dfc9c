import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import logger from './config/logger';
import { QueueController } from './controllers/QueueController';
import { SearchController } from './controllers/SearchController';
import { requireApiKey } from './middleware/apiKey';
import { errorHandler } from './middleware/errorHandler';
import { createQueueRouter } from './routes/queue';
import { createSearchRouter } from './routes/search';
import type { PipelineEventBus } from './services/events/pipelineEvents';
import type { QueueService } from './services/pipeline/queueService';

export interface AppDependencies {
  queue: QueueService;
  events: PipelineEventBus;
  apiKey: string | null;
  /** Extra fields for /health, e.g. whether the worker is running. */
  health?: () => Record<string, unknown>;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', ...(deps.health?.() ?? {}) });
  });

  const api = express.Router();
  api.use(requireApiKey(deps.apiKey));
  api.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', queue: deps.queue.countsByStatus(), ...(deps.health?.() ?? {}) });
  });
  api.use('/queue', createQueueRouter(new QueueController(deps.queue, deps.events)));
  api.use('/search', createSearchRouter(new SearchController(deps.queue)));
  app.use('/api', api);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
