import fs from 'fs';
import path from 'path';
import { NotFoundError } from '../errors/appErrors';
import type { UploadedFile } from '../models/file';
import { Database, Row, numberColumn, textColumn } from '../utilities/db';
import { logger } from '../utilities/logger';
import { validateFileName } from './fileValidator';

const MAX_NAME_LENGTH = 128;

const FILE_COLUMNS = 'fileId, fileName, originalName, storedPath, extension, sizeBytes, uploadedAt';

function toUploadedFile(row: Row): UploadedFile {
  return {
    fileId: numberColumn(row, 'fileId'),
    fileName: textColumn(row, 'fileName'),
    originalName: textColumn(row, 'originalName'),
    storedPath: textColumn(row, 'storedPath'),
    extension: textColumn(row, 'extension'),
    sizeBytes: numberColumn(row, 'sizeBytes'),
    uploadedAt: textColumn(row, 'uploadedAt'),
  };
}

/**
 * Reduces an uploaded name to a safe basename: no directories, only
 * [a-zA-Z0-9._-], at most 128 characters with the extension kept intact.
 */
export function sanitizeFileName(originalName: string): string {
  const base = originalName.split(/[\\/]/).pop() ?? '';
  const ext = path.extname(base);
  const safeExt = ext.replace(/[^a-zA-Z0-9.]/g, '_');
  const stem = base
    .slice(0, base.length - ext.length)
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/^\.+/, '')
    .slice(0, MAX_NAME_LENGTH - safeExt.length);
  return `${stem || 'file'}${safeExt}`;
}

/**
 * Owns uploaded bytes on disk and their metadata rows. Every method runs on
 * the shared database queue; `save` and `delete` join the caller's
 * transaction when one is open, so disk changes follow its outcome.
 */
export class FileStore {
  constructor(
    private readonly db: Database,
    private readonly uploadDir: string
  ) {}

  async save(originalName: string, bytes: Buffer): Promise<UploadedFile> {
    const extension = validateFileName(originalName);
    await fs.promises.mkdir(this.uploadDir, { recursive: true });

    return this.db.transaction(async () => {
      const fileName = await this.uniqueName(sanitizeFileName(originalName));
      const storedPath = path.resolve(this.uploadDir, fileName);
      const uploadedAt = new Date().toISOString();

      const { lastID } = await this.db.run(
        `
        INSERT INTO Files (fileName, originalName, storedPath, extension, sizeBytes, uploadedAt)
        VALUES (?, ?, ?, ?, ?, ?)
        `,
        [fileName, originalName, storedPath, extension, bytes.length, uploadedAt]
      );

      this.db.onRollback(() => removeIfPresent(storedPath));
      await fs.promises.writeFile(storedPath, bytes, { flag: 'wx' });
      logger.info(`File saved: ${storedPath}`);

      return {
        fileId: lastID,
        fileName,
        originalName,
        storedPath,
        extension,
        sizeBytes: bytes.length,
        uploadedAt,
      };
    });
  }

  async list(): Promise<UploadedFile[]> {
    const rows = await this.db.exclusive(() =>
      this.db.all(
        `
        SELECT ${FILE_COLUMNS}
        FROM Files
        ORDER BY fileId DESC
        `
      )
    );
    return rows.map(toUploadedFile);
  }

  async get(fileId: number): Promise<UploadedFile> {
    const row = await this.db.exclusive(() =>
      this.db.get(`SELECT ${FILE_COLUMNS} FROM Files WHERE fileId = ?`, [fileId])
    );
    if (!row) {
      throw new NotFoundError('File', fileId);
    }
    return toUploadedFile(row);
  }

  readBytes(file: UploadedFile): Promise<Buffer> {
    return fs.promises.readFile(file.storedPath);
  }

  /**
   * Removes the file row; chunks and vectors go with it through the
   * foreign-key cascade. The bytes are unlinked once the deletion commits.
   */
  delete(fileId: number): Promise<UploadedFile> {
    return this.db.transaction(async () => {
      const file = await this.get(fileId);
      await this.db.run('DELETE FROM Files WHERE fileId = ?', [fileId]);
      this.db.onCommit(async () => {
        await removeIfPresent(file.storedPath);
        logger.info(`File deleted: ${file.storedPath}`);
      });
      return file;
    });
  }

  // Deterministic collision policy: name.ext, name_1.ext, name_2.ext, ...
  private async uniqueName(fileName: string): Promise<string> {
    const ext = path.extname(fileName);
    const stem = fileName.slice(0, fileName.length - ext.length);
    let candidate = fileName;
    for (let counter = 1; await this.isTaken(candidate); counter++) {
      candidate = `${stem}_${counter}${ext}`;
    }
    return candidate;
  }

  private async isTaken(fileName: string): Promise<boolean> {
    const row = await this.db.get('SELECT fileId FROM Files WHERE fileName = ?', [fileName]);
    if (row) return true;
    return fs.promises
      .access(path.join(this.uploadDir, fileName))
      .then(() => true)
      .catch(() => false);
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
    throw err;
  }
}
