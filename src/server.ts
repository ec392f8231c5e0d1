import dotenv from 'dotenv';

dotenv.config();

import { createApp } from './app';
import { OpenAIEmbeddingProvider } from './services/embeddingService';
import { FileStore } from './services/fileStore';
import { OllamaModelClient } from './services/modelClient';
import { VectorIndex } from './services/vectorIndex';
import { AppConfig, loadConfig } from './utilities/config';
import { Database } from './utilities/db';
import { logger } from './utilities/logger';

async function startServer(config: AppConfig) {
  const db = await Database.open(config.dbPath);
  const app = createApp({
    config,
    db,
    fileStore: new FileStore(db, config.uploadDir),
    vectorIndex: new VectorIndex(db, config.embeddingModel),
    embedder: new OpenAIEmbeddingProvider({
      baseUrl: config.ollama.baseUrl,
      model: config.embeddingModel,
      timeoutMs: config.ollama.timeoutMs,
      concurrency: config.embeddingConcurrency,
    }),
    modelClient: new OllamaModelClient(config.ollama),
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on port: ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      db.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('Failed to close database:', err);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  try {
    startServer(loadConfig()).catch((err: unknown) => {
      logger.error('Failed to start server:', err);
      process.exit(1);
    });
  } catch (err) {
    logger.error('Invalid configuration:', err);
    process.exit(1);
  }
}
