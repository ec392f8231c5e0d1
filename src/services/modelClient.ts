import OpenAI from 'openai';
import {
  ModelGenerationError,
  ModelServiceUnavailableError,
  RequestAbortedError,
  errorMessage,
} from '../errors/appErrors';
import type { Completion } from '../models/query';
import { logger } from '../utilities/logger';

export interface ModelStatus {
  available: boolean;
  baseUrl: string;
  defaultModel: string;
  models: string[];
}

export interface ModelClient {
  readonly defaultModel: string;
  complete(prompt: string, model?: string, signal?: AbortSignal): Promise<Completion>;
  listModels(signal?: AbortSignal): Promise<string[]>;
  isAvailable(): Promise<boolean>;
  status(): Promise<ModelStatus>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  defaultModel: string;
  timeoutMs: number;
}

/**
 * Translates SDK failures into the service's error taxonomy. Connection
 * failures and timeouts mean the daemon is unreachable; any response it did
 * send, including 404 for an unknown model, is a generation failure.
 */
export function toModelError(err: unknown, model?: string): Error {
  if (err instanceof OpenAI.APIUserAbortError) {
    return new RequestAbortedError();
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new ModelServiceUnavailableError(errorMessage(err));
  }
  if (err instanceof OpenAI.APIError) {
    const label = model ? `Model '${model}'` : 'Model service';
    return new ModelGenerationError(`${label} returned an error: ${err.message}`, model);
  }
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Text generation against a local Ollama daemon through its OpenAI
 * compatible API. One attempt per call, bounded by timeoutMs.
 */
export class OllamaModelClient implements ModelClient {
  readonly defaultModel: string;
  private readonly baseUrl: string;
  private readonly openai: OpenAI;

  constructor(options: OllamaClientOptions, client?: OpenAI) {
    this.baseUrl = options.baseUrl;
    this.defaultModel = options.defaultModel;
    this.openai =
      client ??
      new OpenAI({
        baseURL: `${options.baseUrl}/v1`,
        apiKey: 'ollama',
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(prompt: string, model: string = this.defaultModel, signal?: AbortSignal): Promise<Completion> {
    let text: string | null | undefined;
    try {
      const completion = await this.openai.chat.completions.create(
        {
          model,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );
      text = completion.choices[0]?.message?.content;
    } catch (err) {
      logger.error(`Generation with '${model}' failed: ${errorMessage(err)}`);
      throw toModelError(err, model);
    }
    if (!text || !text.trim()) {
      throw new ModelGenerationError(`Model '${model}' returned an empty completion`, model);
    }
    return { text, model };
  }

  async listModels(signal?: AbortSignal): Promise<string[]> {
    try {
      const page = await this.openai.models.list({ signal });
      return page.data.map((entry) => entry.id);
    } catch (err) {
      logger.error(`Listing models failed: ${errorMessage(err)}`);
      throw toModelError(err);
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.listModels();
      return true;
    } catch (err) {
      logger.warn(`Model service health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async status(): Promise<ModelStatus> {
    let models: string[] = [];
    let available = true;
    try {
      models = await this.listModels();
    } catch (err) {
      logger.warn(`Model service status check failed: ${errorMessage(err)}`);
      available = false;
    }
    return { available, baseUrl: this.baseUrl, defaultModel: this.defaultModel, models };
  }
}
