import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { InMemoryRunStore, JsZipArchiveReader } from '@simval/adapters';
import type {
  ActorTypeCatalog,
  BatchIndexingPort,
  RunEvaluationPort,
  RunStorePort,
} from '@simval/domain';

import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { getActorTypeCatalog } from './config/actor-types.js';
import { createBatchRouter } from './controllers/batch.controller.js';
import { createActorTypesRouter } from './controllers/actor-types.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { BatchIndexService } from './services/batch/batch-indexer.js';
import { RunEvaluationService } from './services/evaluation/evaluator.js';

export interface AppDeps {
  config?: AppConfig;
  store?: RunStorePort;
  catalog?: ActorTypeCatalog;
  indexer?: BatchIndexingPort;
  evaluator?: RunEvaluationPort;
}

export function buildApp(deps: AppDeps = {}): ReturnType<typeof express> {
  const config = deps.config ?? loadConfig();
  const store = deps.store ?? new InMemoryRunStore();
  const catalog = deps.catalog ?? getActorTypeCatalog();
  const indexer = deps.indexer ?? new BatchIndexService(store, new JsZipArchiveReader());
  const evaluator = deps.evaluator ?? new RunEvaluationService(catalog);

  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.CORS_ORIGIN }));
  if (config.NODE_ENV !== 'test') app.use(morgan(config.HTTP_LOG_FORMAT));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/actor-types', createActorTypesRouter(catalog));
  app.use(
    '/api/batch',
    createBatchRouter({ store, indexer, evaluator, uploadLimitMb: config.UPLOAD_LIMIT_MB }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
