import { Request, Response } from 'express';
import { ValidationError } from '../errors/appErrors';
import { abortSignalFor } from '../middlewares/abortSignal';
import { validate } from '../middlewares/validate';
import { fileIdParams } from '../models/schemas';
import { FileStore } from '../services/fileStore';
import { supportedExtensions } from '../services/fileValidator';
import { IngestionService } from '../services/ingestionService';
import { VectorIndex } from '../services/vectorIndex';
import { logger } from '../utilities/logger';

export function createFileController(
  ingestion: IngestionService,
  fileStore: FileStore,
  vectorIndex: VectorIndex,
  maxFileSizeBytes: number
) {
  return {
    async upload(req: Request, res: Response) {
      if (!req.file) {
        logger.warn('File upload attempted with no file attached');
        throw new ValidationError("No file uploaded. Send it in the multipart field 'file'.");
      }
      logger.info(`POST /files/upload - ${req.file.originalname} (${req.file.size} bytes)`);
      const { file, chunkCount } = await ingestion.ingest(
        req.file.originalname,
        req.file.buffer,
        abortSignalFor(res)
      );
      res.status(201).json({
        fileId: file.fileId,
        fileName: file.fileName,
        status: 'processed',
        chunkCount,
        file,
      });
    },

    async list(req: Request, res: Response) {
      const files = await fileStore.list();
      res.json({ files, totalFiles: files.length });
    },

    async get(req: Request, res: Response) {
      const { fileId } = validate(fileIdParams, req.params);
      const file = await fileStore.get(fileId);
      const chunks = await vectorIndex.chunksForFile(fileId);
      res.json({ file, chunkCount: chunks.length });
    },

    async remove(req: Request, res: Response) {
      const { fileId } = validate(fileIdParams, req.params);
      const { deletedChunks } = await ingestion.deleteFile(fileId);
      res.json({ success: true, fileId, deletedChunks });
    },

    async extensions(req: Request, res: Response) {
      res.json({
        supportedExtensions: supportedExtensions(),
        maxFileSizeBytes,
      });
    },
  };
}
