import { AsyncLocalStorage } from 'async_hooks';
import fs from 'fs';
import path from 'path';
import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic, SqlValue } from 'sql.js';
import { logger } from './logger';

export type SqlParam = string | number | null;

export type Row = Record<string, SqlValue>;

export interface RunResult {
  lastID: number;
  changes: number;
}

interface TransactionHooks {
  commit: Array<() => Promise<void>>;
  rollback: Array<() => Promise<void>>;
}

export function textColumn(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column '${column}' is not text`);
  }
  return value;
}

export function numberColumn(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`Column '${column}' is not a number`);
  }
  return value;
}

// SUM() and friends return NULL over an empty table
export function optionalNumberColumn(row: Row | undefined, column: string): number {
  const value = row?.[column];
  return typeof value === 'number' ? value : 0;
}

async function runHooks(hooks: Array<() => Promise<void>>): Promise<void> {
  for (const hook of hooks) {
    try {
      await hook();
    } catch (err) {
      logger.error('Transaction hook failed:', err);
    }
  }
}

let sqlJs: Promise<SqlJsStatic> | undefined;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs();
  return sqlJs;
}

/**
 * SQLite database held in memory by sql.js and written back to dbPath after
 * every committed transaction. ':memory:' is never written.
 *
 * The connection is shared by every request, so all access goes through
 * `exclusive`, which queues callers one at a time. The queue is reentrant
 * within one async call chain, so a service already holding it can call
 * into other services that also take it.
 */
export class Database {
  private tail: Promise<void> = Promise.resolve();
  private readonly holder = new AsyncLocalStorage<Database>();
  private hooks: TransactionHooks | undefined;
  private closed = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly dbPath: string
  ) {}

  static async open(dbPath: string): Promise<Database> {
    const SQL = await loadSqlJs();
    let data: Buffer | undefined;
    if (dbPath !== ':memory:') {
      await fs.promises.mkdir(path.dirname(path.resolve(dbPath)), { recursive: true });
      if (fs.existsSync(dbPath)) {
        data = await fs.promises.readFile(dbPath);
      }
    }
    const database = new Database(new SQL.Database(data), dbPath);
    await database.setup();
    return database;
  }

  async run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    const conn = this.connection();
    conn.run(sql, params);
    const changes = conn.getRowsModified();
    const [result] = conn.exec('SELECT last_insert_rowid() AS lastID');
    const lastID = result?.values[0]?.[0];
    return { lastID: typeof lastID === 'number' ? lastID : 0, changes };
  }

  async all(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    const statement = this.connection().prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  async get(sql: string, params: SqlParam[] = []): Promise<Row | undefined> {
    const [row] = await this.all(sql, params);
    return row;
  }

  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.holder.getStore() === this) {
      return fn();
    }
    const result = this.tail.then(() => this.holder.run(this, fn));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /**
   * Commits everything written by fn, or nothing if it throws. A transaction
   * started while another one is open on the same call chain joins it.
   * Hooks registered with onCommit/onRollback run after the outermost
   * transaction settles; use them for side effects outside the database.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.holder.getStore() === this && this.hooks) {
      return fn();
    }
    return this.exclusive(async () => {
      await this.run('BEGIN TRANSACTION');
      const hooks: TransactionHooks = { commit: [], rollback: [] };
      this.hooks = hooks;
      let result: T;
      try {
        result = await fn();
        await this.run('COMMIT');
      } catch (err) {
        this.hooks = undefined;
        try {
          await this.run('ROLLBACK');
        } catch (rollbackErr) {
          logger.error('Error during ROLLBACK:', rollbackErr);
        }
        await runHooks(hooks.rollback);
        throw err;
      }
      this.hooks = undefined;
      await this.persist();
      await runHooks(hooks.commit);
      return result;
    });
  }

  onCommit(hook: () => Promise<void>): void {
    this.currentHooks().commit.push(hook);
  }

  onRollback(hook: () => Promise<void>): void {
    this.currentHooks().rollback.push(hook);
  }

  private currentHooks(): TransactionHooks {
    if (!this.hooks || this.holder.getStore() !== this) {
      throw new Error('Transaction hooks can only be registered inside a transaction');
    }
    return this.hooks;
  }

  close(): Promise<void> {
    return this.exclusive(async () => {
      this.connection();
      await this.persist();
      this.closed = true;
      this.db.close();
    });
  }

  private connection(): SqlJsDatabase {
    if (this.closed) {
      throw new Error('Database is closed');
    }
    return this.db;
  }

  private async persist(): Promise<void> {
    if (this.dbPath === ':memory:') {
      return;
    }
    const data = this.db.export();
    // export() reopens the connection, which drops per-connection pragmas
    this.db.run('PRAGMA foreign_keys = ON;');
    const tmpPath = `${this.dbPath}.tmp`;
    try {
      await fs.promises.writeFile(tmpPath, Buffer.from(data));
      await fs.promises.rename(tmpPath, this.dbPath);
    } catch (err) {
      logger.error(`Failed to write database to ${this.dbPath}:`, err);
      throw err;
    }
  }

  private async setup(): Promise<void> {
    try {
      await this.run('PRAGMA foreign_keys = ON;');
      await this.run(
        `
        CREATE TABLE IF NOT EXISTS Files (
          fileId INTEGER PRIMARY KEY AUTOINCREMENT,
          fileName TEXT NOT NULL UNIQUE,
          originalName TEXT NOT NULL,
          storedPath TEXT NOT NULL,
          extension TEXT NOT NULL,
          sizeBytes INTEGER NOT NULL,
          uploadedAt TEXT NOT NULL
        );
      `
      );
      await this.run(
        `
        CREATE TABLE IF NOT EXISTS FileChunks (
          fileChunkId INTEGER PRIMARY KEY AUTOINCREMENT,
          fkFileId INTEGER NOT NULL,
          chunkIndex INTEGER NOT NULL,
          content TEXT NOT NULL,
          overlap INTEGER NOT NULL DEFAULT 0,
          UNIQUE (fkFileId, chunkIndex),
          FOREIGN KEY (fkFileId) REFERENCES Files(fileId) ON DELETE CASCADE
        );
      `
      );
      await this.run(
        `
        CREATE TABLE IF NOT EXISTS FileVectors (
          fileVectorId INTEGER PRIMARY KEY AUTOINCREMENT,
          fkChunkId INTEGER NOT NULL UNIQUE,
          embedding TEXT NOT NULL,
          embeddingModel TEXT NOT NULL,
          dimensions INTEGER NOT NULL,
          FOREIGN KEY (fkChunkId) REFERENCES FileChunks(fileChunkId) ON DELETE CASCADE
        );
      `
      );
      await this.run('CREATE INDEX IF NOT EXISTS idxFileVectorsModel ON FileVectors (embeddingModel);');
      await this.persist();
      logger.info('Database setup complete.');
    } catch (err) {
      logger.error('Database setup failed:', err);
      throw err;
    }
  }
}
