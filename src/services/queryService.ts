import { ModelGenerationError, ModelServiceUnavailableError } from '../errors/appErrors';
import type { Completion, QueryRequest, QueryResult, RetrievedChunk } from '../models/query';
import { logger } from '../utilities/logger';
import { EmbeddingProvider } from './embeddingService';
import { ModelClient } from './modelClient';
import { VectorIndex } from './vectorIndex';

export function buildContext(chunks: RetrievedChunk[], maxChars: number): string {
  const context = chunks
    .map((chunk, idx) => `[Source ${idx + 1}: ${chunk.fileName}]\n${chunk.content}`)
    .join('\n\n');
  return context.length > maxChars ? context.slice(0, maxChars) : context;
}

export function buildPrompt(context: string, prompt: string): string {
  return `Based on the following context, please answer the question:

Context:
${context}

Question: ${prompt}

Please provide a comprehensive answer based on the context provided above.`;
}

/**
 * Retrieval-augmented answering. Holds no state between calls.
 */
export class QueryService {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly embedder: EmbeddingProvider,
    private readonly modelClient: ModelClient,
    private readonly maxContextChars: number
  ) {}

  async query(request: QueryRequest, signal?: AbortSignal): Promise<QueryResult> {
    const [vector] = await this.embedder.embed([request.prompt], signal);
    const chunks = await this.vectorIndex.query(vector, request.nResults);
    const context = buildContext(chunks, this.maxContextChars);
    const result: QueryResult = {
      query: request.prompt,
      context,
      chunks,
      sources: [...new Set(chunks.map((chunk) => chunk.fileName))],
    };
    if (!request.useLlm) {
      return result;
    }

    // Without any retrieved context the question goes to the model as asked
    const prompt = chunks.length > 0 ? buildPrompt(context, request.prompt) : request.prompt;
    try {
      const completion = await this.modelClient.complete(prompt, request.model, signal);
      result.answer = completion.text;
      result.model = completion.model;
    } catch (err) {
      if (!(err instanceof ModelGenerationError || err instanceof ModelServiceUnavailableError)) {
        throw err;
      }
      logger.warn(`Answer generation failed, returning retrieved chunks only: ${err.message}`);
      result.generationError = { code: err.code, message: err.message, status: err.status };
    }
    return result;
  }

  chat(prompt: string, model?: string, signal?: AbortSignal): Promise<Completion> {
    return this.modelClient.complete(prompt, model, signal);
  }
}
