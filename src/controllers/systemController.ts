import { Request, Response } from 'express';
import { ModelClient } from '../services/modelClient';
import { VectorIndex } from '../services/vectorIndex';

const ENDPOINTS = {
  health: 'GET /health',
  upload: 'POST /files/upload',
  files: 'GET /files',
  file: 'GET /files/:fileId',
  deleteFile: 'DELETE /files/:fileId',
  supportedExtensions: 'GET /files/supported/extensions',
  query: 'POST /rag/query',
  stats: 'GET /rag/stats',
  reset: 'POST /rag/reset',
  ragHealth: 'GET /rag/health',
  chat: 'POST /llm/chat',
  models: 'GET /llm/models',
  modelStatus: 'GET /llm/status',
};

export function createSystemController(vectorIndex: VectorIndex, modelClient: ModelClient) {
  return {
    async info(req: Request, res: Response) {
      res.json({ name: 'study-docs-rag', endpoints: ENDPOINTS });
    },

    // Reports both dependencies; the service itself is up whenever it answers
    async health(req: Request, res: Response) {
      const [index, model] = await Promise.all([vectorIndex.isAvailable(), modelClient.isAvailable()]);
      res.json({
        status: index && model ? 'healthy' : 'degraded',
        services: {
          vectorIndex: index ? 'available' : 'unavailable',
          modelService: model ? 'available' : 'unavailable',
        },
      });
    },
  };
}
