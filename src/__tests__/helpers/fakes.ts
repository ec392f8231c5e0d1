import {
  ModelGenerationError,
  ModelServiceUnavailableError,
  RequestAbortedError,
} from '../../errors/appErrors';
import type { Completion } from '../../models/query';
import { EmbeddingProvider } from '../../services/embeddingService';
import { ModelClient, ModelStatus } from '../../services/modelClient';

function hashWord(word: string): number {
  let hash = 2166136261;
  for (let i = 0; i < word.length; i++) {
    hash ^= word.charCodeAt(i);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

// Bag-of-words vector: texts sharing words point in similar directions
export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    vector[hashWord(word) % dimensions] += 1;
  }
  return vector;
}

export class FakeEmbeddingProvider implements EmbeddingProvider {
  calls: string[][] = [];
  failWith: Error | undefined;
  onEmbed: (() => void) | undefined;

  constructor(
    readonly modelName = 'fake-embedder',
    private readonly dimensions = 256
  ) {}

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    this.calls.push(texts);
    this.onEmbed?.();
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return texts.map((text) => hashEmbedding(text, this.dimensions));
  }
}

export class FakeModelClient implements ModelClient {
  readonly defaultModel = 'llama2';
  models = ['llama2', 'mistral'];
  available = true;
  prompts: string[] = [];

  async complete(prompt: string, model: string = this.defaultModel, signal?: AbortSignal): Promise<Completion> {
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }
    if (!this.available) {
      throw new ModelServiceUnavailableError('connect ECONNREFUSED 127.0.0.1:11434');
    }
    if (!this.models.includes(model)) {
      throw new ModelGenerationError(`Model '${model}' returned an error: 404 model '${model}' not found`, model);
    }
    this.prompts.push(prompt);
    return { text: `answer from ${model}`, model };
  }

  async listModels(): Promise<string[]> {
    if (!this.available) {
      throw new ModelServiceUnavailableError('connect ECONNREFUSED 127.0.0.1:11434');
    }
    return [...this.models];
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async status(): Promise<ModelStatus> {
    return {
      available: this.available,
      baseUrl: 'http://localhost:11434',
      defaultModel: this.defaultModel,
      models: this.available ? [...this.models] : [],
    };
  }
}
