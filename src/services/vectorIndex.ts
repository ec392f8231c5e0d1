import { dot, norm } from 'vectorious';
import { IndexUnavailableError, errorMessage } from '../errors/appErrors';
import type { FileChunk } from '../models/file';
import type { RetrievedChunk } from '../models/query';
import { Database, Row, numberColumn, optionalNumberColumn, textColumn } from '../utilities/db';
import { logger } from '../utilities/logger';

export interface NewChunk {
  fileId: number;
  chunkIndex: number;
  content: string;
  overlap: number;
}

export interface IndexStats {
  documentCount: number;
  totalChunks: number;
  embeddingModel: string;
  staleVectors: number;
}

function toChunk(row: Row): FileChunk {
  return {
    chunkId: numberColumn(row, 'fileChunkId'),
    fileId: numberColumn(row, 'fkFileId'),
    chunkIndex: numberColumn(row, 'chunkIndex'),
    content: textColumn(row, 'content'),
    overlap: numberColumn(row, 'overlap'),
  };
}

function parseEmbedding(row: Row): number[] {
  const parsed: unknown = JSON.parse(textColumn(row, 'embedding'));
  if (!Array.isArray(parsed) || !parsed.every((value) => typeof value === 'number')) {
    throw new Error(`Chunk ${numberColumn(row, 'fileChunkId')} has a malformed embedding`);
  }
  return parsed;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  const denominator = norm(a) * norm(b);
  return denominator === 0 ? 0 : dot(a, b) / denominator;
}

/**
 * Chunk and vector storage on top of the shared SQLite database.
 *
 * Vectors are tagged with the embedding model that produced them and only
 * vectors of the active model take part in ranking, so switching models
 * never mixes scores from different vector spaces.
 */
export class VectorIndex {
  constructor(
    private readonly db: Database,
    readonly embeddingModel: string
  ) {}

  async upsert(chunk: NewChunk, vector: number[]): Promise<FileChunk> {
    const [stored] = await this.upsertMany([chunk], [vector]);
    return stored;
  }

  /**
   * Writes chunks and their vectors in one transaction, replacing any chunk
   * already stored at the same (fileId, chunkIndex).
   */
  async upsertMany(chunks: NewChunk[], vectors: number[][]): Promise<FileChunk[]> {
    if (chunks.length !== vectors.length) {
      throw new Error(`Got ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    return this.guard('upsert', () =>
      this.db.transaction(async () => {
        const stored: FileChunk[] = [];
        for (let idx = 0; idx < chunks.length; idx++) {
          const chunk = chunks[idx];
          const vector = vectors[idx];
          await this.db.run('DELETE FROM FileChunks WHERE fkFileId = ? AND chunkIndex = ?', [
            chunk.fileId,
            chunk.chunkIndex,
          ]);
          const { lastID } = await this.db.run(
            'INSERT INTO FileChunks (fkFileId, chunkIndex, content, overlap) VALUES (?, ?, ?, ?)',
            [chunk.fileId, chunk.chunkIndex, chunk.content, chunk.overlap]
          );
          await this.db.run(
            'INSERT INTO FileVectors (fkChunkId, embedding, embeddingModel, dimensions) VALUES (?, ?, ?, ?)',
            [lastID, JSON.stringify(vector), this.embeddingModel, vector.length]
          );
          stored.push({ chunkId: lastID, ...chunk });
        }
        return stored;
      })
    );
  }

  /**
   * Top-k chunks by descending cosine similarity to the query vector.
   */
  query(vector: number[], k: number): Promise<RetrievedChunk[]> {
    return this.guard('query', async () => {
      const rows = await this.db.exclusive(() =>
        this.db.all(
          `
          SELECT c.fileChunkId, c.fkFileId, c.chunkIndex, c.content, c.overlap, f.fileName, v.embedding
          FROM FileVectors v
          JOIN FileChunks c ON c.fileChunkId = v.fkChunkId
          JOIN Files f ON f.fileId = c.fkFileId
          WHERE v.embeddingModel = ? AND v.dimensions = ?
          `,
          [this.embeddingModel, vector.length]
        )
      );
      if (rows.length === 0) {
        return [];
      }
      const scored = rows.map((row) => ({
        ...toChunk(row),
        fileName: textColumn(row, 'fileName'),
        score: cosineSimilarity(vector, parseEmbedding(row)),
      }));
      scored.sort((a, b) => b.score - a.score || a.chunkId - b.chunkId);
      return scored.slice(0, k);
    });
  }

  chunksForFile(fileId: number): Promise<FileChunk[]> {
    return this.guard('read', async () => {
      const rows = await this.db.exclusive(() =>
        this.db.all(
          `
          SELECT fileChunkId, fkFileId, chunkIndex, content, overlap
          FROM FileChunks
          WHERE fkFileId = ?
          ORDER BY chunkIndex ASC
          `,
          [fileId]
        )
      );
      return rows.map(toChunk);
    });
  }

  /** Removes every chunk of a file; vectors follow through the cascade. */
  deleteByFile(fileId: number): Promise<number> {
    return this.guard('delete', () =>
      this.db.transaction(async () => {
        const { changes } = await this.db.run('DELETE FROM FileChunks WHERE fkFileId = ?', [fileId]);
        return changes;
      })
    );
  }

  stats(): Promise<IndexStats> {
    return this.guard('stats', () =>
      this.db.exclusive(async () => {
        const files = await this.db.get('SELECT COUNT(*) AS count FROM Files');
        const vectors = await this.db.get(
          `
          SELECT
            SUM(CASE WHEN embeddingModel = ? THEN 1 ELSE 0 END) AS current,
            SUM(CASE WHEN embeddingModel = ? THEN 0 ELSE 1 END) AS stale
          FROM FileVectors
          `,
          [this.embeddingModel, this.embeddingModel]
        );
        return {
          documentCount: optionalNumberColumn(files, 'count'),
          totalChunks: optionalNumberColumn(vectors, 'current'),
          embeddingModel: this.embeddingModel,
          staleVectors: optionalNumberColumn(vectors, 'stale'),
        };
      })
    );
  }

  /** Drops every chunk and vector. Uploaded files are kept. */
  reset(): Promise<number> {
    return this.guard('reset', () =>
      this.db.transaction(async () => {
        const { changes } = await this.db.run('DELETE FROM FileChunks');
        logger.info(`Vector index reset, removed ${changes} chunks`);
        return changes;
      })
    );
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.db.exclusive(() => this.db.get('SELECT 1 FROM FileVectors LIMIT 1'));
      return true;
    } catch (err) {
      logger.warn(`Vector index health check failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logger.error(`Vector index ${operation} failed: ${errorMessage(err)}`);
      throw new IndexUnavailableError(`${operation} failed: ${errorMessage(err)}`);
    }
  }
}
