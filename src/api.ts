import express from 'express';
import multer from 'multer';
import { createFileController } from './controllers/fileController';
import { createLlmController } from './controllers/llmController';
import { createRagController } from './controllers/ragController';
import { createSystemController } from './controllers/systemController';
import { asyncHandler } from './middlewares/asyncHandler';
import { FileStore } from './services/fileStore';
import { IngestionService } from './services/ingestionService';
import { ModelClient } from './services/modelClient';
import { QueryService } from './services/queryService';
import { VectorIndex } from './services/vectorIndex';
import { AppConfig } from './utilities/config';

export interface RouterServices {
  config: AppConfig;
  fileStore: FileStore;
  vectorIndex: VectorIndex;
  modelClient: ModelClient;
  ingestion: IngestionService;
  queryService: QueryService;
}

export function createRouter(services: RouterServices): express.Router {
  const { config, fileStore, vectorIndex, modelClient, ingestion, queryService } = services;
  const router = express.Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    // browsers send non-ASCII filenames as raw UTF-8
    defParamCharset: 'utf8',
    limits: { fileSize: config.maxFileSizeBytes, files: 1 },
  });

  const system = createSystemController(vectorIndex, modelClient);
  const files = createFileController(ingestion, fileStore, vectorIndex, config.maxFileSizeBytes);
  const rag = createRagController(queryService, vectorIndex, {
    collectionName: config.collectionName,
    defaultResultCount: config.defaultResultCount,
  });
  const llm = createLlmController(queryService, modelClient);

  router.get('/', asyncHandler(system.info));
  router.get('/health', asyncHandler(system.health));

  router.post('/files/upload', upload.single('file'), asyncHandler(files.upload));
  router.get('/files', asyncHandler(files.list));
  router.get('/files/supported/extensions', asyncHandler(files.extensions));
  router.get('/files/:fileId', asyncHandler(files.get));
  router.delete('/files/:fileId', asyncHandler(files.remove));

  router.post('/rag/query', asyncHandler(rag.query));
  router.get('/rag/stats', asyncHandler(rag.stats));
  router.post('/rag/reset', asyncHandler(rag.reset));
  router.get('/rag/health', asyncHandler(rag.health));

  router.post('/llm/chat', asyncHandler(llm.chat));
  router.get('/llm/models', asyncHandler(llm.models));
  router.get('/llm/status', asyncHandler(llm.status));

  return router;
}
