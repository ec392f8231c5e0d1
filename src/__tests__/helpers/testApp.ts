import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { createApp } from '../../app';
import { FileStore } from '../../services/fileStore';
import { VectorIndex } from '../../services/vectorIndex';
import { AppConfig, loadConfig } from '../../utilities/config';
import { Database } from '../../utilities/db';
import { FakeEmbeddingProvider, FakeModelClient } from './fakes';

export async function makeUploadDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'study-docs-rag-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export function testConfig(uploadDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({
      NODE_ENV: 'test',
      UPLOAD_DIR: uploadDir,
      DB_PATH: ':memory:',
      CHUNK_SIZE: '200',
      CHUNK_OVERLAP: '40',
    }),
    ...overrides,
  };
}

export interface TestServer {
  baseUrl: string;
  uploadDir: string;
  db: Database;
  fileStore: FileStore;
  vectorIndex: VectorIndex;
  embedder: FakeEmbeddingProvider;
  modelClient: FakeModelClient;
  close(): Promise<void>;
}

export async function startTestServer(overrides: Partial<AppConfig> = {}): Promise<TestServer> {
  const uploadDir = await makeUploadDir();
  const config = testConfig(uploadDir, overrides);
  const db = await Database.open(':memory:');
  const embedder = new FakeEmbeddingProvider(config.embeddingModel);
  const modelClient = new FakeModelClient();
  const fileStore = new FileStore(db, uploadDir);
  const vectorIndex = new VectorIndex(db, config.embeddingModel);
  const app = createApp({ config, db, fileStore, vectorIndex, embedder, modelClient });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    uploadDir,
    db,
    fileStore,
    vectorIndex,
    embedder,
    modelClient,
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      await db.close();
      await removeDir(uploadDir);
    },
  };
}
