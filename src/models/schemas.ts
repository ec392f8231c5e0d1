import { z } from 'zod';

export const fileIdParams = z.object({
  fileId: z.coerce.number().int().positive(),
});

export function queryRequestSchema(defaultResultCount: number) {
  return z.object({
    prompt: z.string().trim().min(1, 'prompt must not be empty'),
    nResults: z.number().int().min(1).max(20).default(Math.min(defaultResultCount, 20)),
    model: z.string().trim().min(1).optional(),
    useLlm: z.boolean().default(true),
  });
}

export const chatRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  model: z.string().trim().min(1).optional(),
});
