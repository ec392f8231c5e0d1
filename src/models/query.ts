import type { FileChunk } from './file';

export interface QueryRequest {
  prompt: string;
  nResults: number;
  model?: string;
  useLlm: boolean;
}

export interface RetrievedChunk extends FileChunk {
  fileName: string;
  score: number;
}

export interface GenerationFailure {
  code: string;
  message: string;
  status: number;
}

export interface QueryResult {
  query: string;
  context: string;
  chunks: RetrievedChunk[];
  sources: string[];
  answer?: string;
  model?: string;
  generationError?: GenerationFailure;
}

export interface Completion {
  text: string;
  model: string;
}
