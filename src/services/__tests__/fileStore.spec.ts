import fs from 'fs';
import path from 'path';
import { NotFoundError, UnsupportedFileTypeError } from '../../errors/appErrors';
import { Database } from '../../utilities/db';
import { makeUploadDir, removeDir } from '../../__tests__/helpers/testApp';
import { FileStore, sanitizeFileName } from '../fileStore';

describe('sanitizeFileName', () => {
  it('drops directory components', () => {
    expect(sanitizeFileName('../../etc/passwd.txt')).toBe('passwd.txt');
    expect(sanitizeFileName('C:\\Users\\student\\notes.md')).toBe('notes.md');
  });

  it('replaces unsafe characters', () => {
    expect(sanitizeFileName('my notes (v2).md')).toBe('my_notes__v2_.md');
  });

  it('strips leading dots', () => {
    expect(sanitizeFileName('..hidden.txt')).toBe('hidden.txt');
  });

  it('keeps the extension when truncating', () => {
    const name = sanitizeFileName(`${'a'.repeat(200)}.txt`);
    expect(name).toHaveLength(128);
    expect(name.endsWith('.txt')).toBe(true);
  });
});

describe('FileStore', () => {
  let db: Database;
  let uploadDir: string;
  let store: FileStore;

  beforeEach(async () => {
    db = await Database.open(':memory:');
    uploadDir = await makeUploadDir();
    store = new FileStore(db, uploadDir);
  });

  afterEach(async () => {
    await db.close();
    await removeDir(uploadDir);
  });

  it('stores bytes and metadata', async () => {
    const file = await store.save('Biology Notes.txt', Buffer.from('cells divide'));
    expect(file).toMatchObject({
      fileName: 'Biology_Notes.txt',
      originalName: 'Biology Notes.txt',
      extension: 'txt',
      sizeBytes: 12,
      storedPath: path.resolve(uploadDir, 'Biology_Notes.txt'),
    });
    expect(await store.get(file.fileId)).toEqual(file);
    expect((await store.readBytes(file)).toString()).toBe('cells divide');
  });

  it('disambiguates duplicate names with a counter', async () => {
    const names: string[] = [];
    for (let i = 0; i < 3; i++) {
      names.push((await store.save('notes.txt', Buffer.from(`copy ${i}`))).fileName);
    }
    expect(names).toEqual(['notes.txt', 'notes_1.txt', 'notes_2.txt']);
    expect(fs.readFileSync(path.join(uploadDir, 'notes_2.txt'), 'utf-8')).toBe('copy 2');
  });

  it('skips names already taken on disk', async () => {
    fs.writeFileSync(path.join(uploadDir, 'notes.txt'), 'left over');
    const file = await store.save('notes.txt', Buffer.from('fresh'));
    expect(file.fileName).toBe('notes_1.txt');
    expect(fs.readFileSync(path.join(uploadDir, 'notes.txt'), 'utf-8')).toBe('left over');
  });

  it('lists files newest first', async () => {
    const first = await store.save('a.txt', Buffer.from('a'));
    const second = await store.save('b.md', Buffer.from('b'));
    expect((await store.list()).map((file) => file.fileId)).toEqual([second.fileId, first.fileId]);
  });

  it('rejects unsupported types without writing anything', async () => {
    await expect(store.save('run.sh', Buffer.from('echo'))).rejects.toThrow(UnsupportedFileTypeError);
    expect(await store.list()).toEqual([]);
    expect(fs.readdirSync(uploadDir)).toEqual([]);
  });

  it('raises NotFoundError for an unknown id', async () => {
    await expect(store.get(42)).rejects.toThrow(new NotFoundError('File', 42));
  });

  it('deletes the row and the stored bytes', async () => {
    const file = await store.save('notes.txt', Buffer.from('x'));
    const deleted = await store.delete(file.fileId);
    expect(deleted.fileId).toBe(file.fileId);
    expect(fs.existsSync(file.storedPath)).toBe(false);
    await expect(store.get(file.fileId)).rejects.toThrow(NotFoundError);
    await expect(store.delete(file.fileId)).rejects.toThrow(NotFoundError);
  });

  it('removes the bytes again when the surrounding transaction rolls back', async () => {
    await expect(
      db.transaction(async () => {
        await store.save('notes.txt', Buffer.from('x'));
        throw new Error('later step failed');
      })
    ).rejects.toThrow('later step failed');
    expect(await store.list()).toEqual([]);
    expect(fs.readdirSync(uploadDir)).toEqual([]);
  });

  it('keeps the bytes when a delete is rolled back', async () => {
    const file = await store.save('notes.txt', Buffer.from('x'));
    await expect(
      db.transaction(async () => {
        await store.delete(file.fileId);
        throw new Error('abort delete');
      })
    ).rejects.toThrow('abort delete');
    expect(fs.existsSync(file.storedPath)).toBe(true);
    expect((await store.get(file.fileId)).fileName).toBe('notes.txt');
  });
});
