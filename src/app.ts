import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { createRouter } from './api';
import { NotFoundError } from './errors/appErrors';
import { createErrorHandler } from './middlewares/errorHandler';
import { requestLogger } from './middlewares/requestLogger';
import { EmbeddingProvider } from './services/embeddingService';
import { FileStore } from './services/fileStore';
import { IngestionService } from './services/ingestionService';
import { ModelClient } from './services/modelClient';
import { QueryService } from './services/queryService';
import { VectorIndex } from './services/vectorIndex';
import { AppConfig } from './utilities/config';
import { Database } from './utilities/db';

export interface AppDependencies {
  config: AppConfig;
  db: Database;
  fileStore: FileStore;
  vectorIndex: VectorIndex;
  embedder: EmbeddingProvider;
  modelClient: ModelClient;
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, db, fileStore, vectorIndex, embedder, modelClient } = deps;
  const ingestion = new IngestionService(db, fileStore, vectorIndex, embedder, {
    chunkSize: config.chunkSize,
    overlap: config.chunkOverlap,
  });
  const queryService = new QueryService(vectorIndex, embedder, modelClient, config.maxContextChars);

  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(requestLogger);

  app.use(createRouter({ config, fileStore, vectorIndex, modelClient, ingestion, queryService }));
  app.use((req, res, next) => next(new NotFoundError('Route', `${req.method} ${req.path}`)));

  // Global error handler
  app.use(createErrorHandler({ isDev: config.isDev, maxFileSizeBytes: config.maxFileSizeBytes }));

  return app;
}
