import { RequestAbortedError } from '../errors/appErrors';
import type { UploadedFile } from '../models/file';
import { Database } from '../utilities/db';
import { logger } from '../utilities/logger';
import { ChunkOptions, splitText } from './chunker';
import { EmbeddingProvider } from './embeddingService';
import { FileStore } from './fileStore';
import { validateFileName } from './fileValidator';
import { extractText } from './textExtractor';
import { VectorIndex } from './vectorIndex';

export interface IngestionResult {
  file: UploadedFile;
  chunkCount: number;
}

export interface DeletionResult {
  file: UploadedFile;
  deletedChunks: number;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}

/**
 * Turns an upload into stored bytes, chunks and vectors.
 *
 * Extraction and embedding happen before the database is touched. The file
 * row, its bytes on disk, its chunks and its vectors are then written in a
 * single transaction, so a failure at any step leaves nothing behind.
 */
export class IngestionService {
  constructor(
    private readonly db: Database,
    private readonly fileStore: FileStore,
    private readonly vectorIndex: VectorIndex,
    private readonly embedder: EmbeddingProvider,
    private readonly chunkOptions: ChunkOptions
  ) {}

  async ingest(originalName: string, bytes: Buffer, signal?: AbortSignal): Promise<IngestionResult> {
    const extension = validateFileName(originalName);
    throwIfAborted(signal);

    const text = await extractText({ fileName: originalName, extension }, bytes);
    const spans = splitText(text, this.chunkOptions);
    const vectors = await this.embedder.embed(
      spans.map((span) => span.content),
      signal
    );
    throwIfAborted(signal);

    const result = await this.db.transaction(async () => {
      const file = await this.fileStore.save(originalName, bytes);
      const chunks = await this.vectorIndex.upsertMany(
        spans.map((span, chunkIndex) => ({
          fileId: file.fileId,
          chunkIndex,
          content: span.content,
          overlap: span.overlap,
        })),
        vectors
      );
      throwIfAborted(signal);
      return { file, chunkCount: chunks.length };
    });

    logger.info(`Ingested ${result.file.fileName} as ${result.chunkCount} chunks`);
    return result;
  }

  /** Deletes a file together with its chunks, vectors and stored bytes. */
  async deleteFile(fileId: number): Promise<DeletionResult> {
    const result = await this.db.transaction(async () => {
      await this.fileStore.get(fileId);
      const deletedChunks = await this.vectorIndex.deleteByFile(fileId);
      const file = await this.fileStore.delete(fileId);
      return { file, deletedChunks };
    });
    logger.info(`Deleted file ${fileId} with ${result.deletedChunks} chunks`);
    return result;
  }
}
