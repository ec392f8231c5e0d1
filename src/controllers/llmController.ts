import { Request, Response } from 'express';
import { abortSignalFor } from '../middlewares/abortSignal';
import { validate } from '../middlewares/validate';
import { chatRequestSchema } from '../models/schemas';
import { ModelClient } from '../services/modelClient';
import { QueryService } from '../services/queryService';

export function createLlmController(queryService: QueryService, modelClient: ModelClient) {
  return {
    async chat(req: Request, res: Response) {
      const { prompt, model } = validate(chatRequestSchema, req.body);
      const completion = await queryService.chat(prompt, model, abortSignalFor(res));
      res.json({ answer: completion.text, model: completion.model });
    },

    async models(req: Request, res: Response) {
      const models = await modelClient.listModels(abortSignalFor(res));
      res.json({ models, totalModels: models.length });
    },

    async status(req: Request, res: Response) {
      res.json(await modelClient.status());
    },
  };
}
