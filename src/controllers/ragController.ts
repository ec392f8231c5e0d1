import { Request, Response } from 'express';
import { abortSignalFor } from '../middlewares/abortSignal';
import { validate } from '../middlewares/validate';
import { queryRequestSchema } from '../models/schemas';
import { QueryService } from '../services/queryService';
import { VectorIndex } from '../services/vectorIndex';

export function createRagController(
  queryService: QueryService,
  vectorIndex: VectorIndex,
  options: { collectionName: string; defaultResultCount: number }
) {
  const querySchema = queryRequestSchema(options.defaultResultCount);

  return {
    async query(req: Request, res: Response) {
      const request = validate(querySchema, req.body);
      const { generationError, ...result } = await queryService.query(request, abortSignalFor(res));
      if (generationError) {
        // Retrieval succeeded, so the chunks travel with the error
        res.status(generationError.status).json({ ...result, error: generationError });
        return;
      }
      res.json(result);
    },

    async stats(req: Request, res: Response) {
      const stats = await vectorIndex.stats();
      res.json({ collectionName: options.collectionName, ...stats });
    },

    async reset(req: Request, res: Response) {
      const deletedChunks = await vectorIndex.reset();
      res.json({ success: true, deletedChunks });
    },

    async health(req: Request, res: Response) {
      const available = await vectorIndex.isAvailable();
      res.status(available ? 200 : 503).json({
        status: available ? 'healthy' : 'unhealthy',
        collectionName: options.collectionName,
        embeddingModel: vectorIndex.embeddingModel,
      });
    },
  };
}
