import OpenAI from 'openai';
import { IndexUnavailableError, RequestAbortedError, errorMessage } from '../errors/appErrors';
import { mapWithConcurrency } from '../utilities/concurrency';
import { logger } from '../utilities/logger';

export interface EmbeddingProvider {
  /** Identifier stored next to every vector this provider produces. */
  readonly modelName: string;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface OpenAIEmbeddingOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  concurrency: number;
  batchSize?: number;
}

/**
 * Sentence embeddings served by the local model daemon through its
 * OpenAI-compatible /v1/embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly modelName: string;
  private readonly openai: OpenAI;
  private readonly concurrency: number;
  private readonly batchSize: number;

  constructor(options: OpenAIEmbeddingOptions, client?: OpenAI) {
    this.modelName = options.model;
    this.concurrency = options.concurrency;
    this.batchSize = options.batchSize ?? 16;
    this.openai =
      client ??
      new OpenAI({
        baseURL: `${options.baseUrl}/v1`,
        apiKey: 'ollama',
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push(texts.slice(i, i + this.batchSize));
    }
    const embedded = await mapWithConcurrency(batches, this.concurrency, (batch) =>
      this.embedBatch(batch, signal)
    );
    return embedded.flat();
  }

  private async embedBatch(input: string[], signal?: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.openai.embeddings.create({ model: this.modelName, input }, { signal });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (err) {
      if (err instanceof OpenAI.APIUserAbortError) {
        throw new RequestAbortedError();
      }
      logger.error(`Embedding API error (${this.modelName}): ${errorMessage(err)}`);
      throw new IndexUnavailableError(`failed to embed text with '${this.modelName}': ${errorMessage(err)}`);
    }
  }
}
