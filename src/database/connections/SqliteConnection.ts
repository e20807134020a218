import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConfig, DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import { DatabaseError, DuplicateKeyError, ErrorCode } from '../../errors/index.js';

const DEFAULT_DB_FILE = './data/moviebot.sqlite';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename || DEFAULT_DB_FILE;

    // ':memory:' has no directory to create
    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      try {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      } catch (err) {
        throw new DatabaseError(`Failed to create database directory: ${dir}`, {
          code: ErrorCode.DATABASE_CONNECTION_FAILED,
          context: { service: 'SqliteConnection', operation: 'connect', metadata: { dir } },
          cause: err instanceof Error ? err : undefined,
        });
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, err => {
        if (err) {
          reject(new DatabaseError(`Failed to connect to SQLite database: ${err.message}`, {
            code: ErrorCode.DATABASE_CONNECTION_FAILED,
            retryable: true,
            context: { service: 'SqliteConnection', operation: 'connect', metadata: { dbPath } },
            cause: err,
          }));
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;
    await this.execute('PRAGMA foreign_keys = ON');
  }

  async query<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows as T[]);
        }
      });
    });
  }

  async get<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get(sql, params, (err, row) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row as T | undefined);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');
    const convert = (err: Error): Error => this.convertDatabaseError(err, sql, 'execute');

    return new Promise((resolve, reject) => {
      db.run(sql, params, function (err) {
        if (err) {
          reject(convert(err));
        } else {
          // 'this' is the statement context carrying changes and lastID
          resolve({
            affectedRows: this.changes,
            insertId: this.lastID,
          });
        }
      });
    });
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) {
      return;
    }

    return new Promise((resolve, reject) => {
      db.close(err => {
        if (err) {
          reject(new DatabaseError(`Failed to close database: ${err.message}`, {
            code: ErrorCode.DATABASE_CONNECTION_FAILED,
            context: { service: 'SqliteConnection', operation: 'close' },
            cause: err,
          }));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  async beginTransaction(): Promise<void> {
    await this.execute('BEGIN TRANSACTION');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError('Database not connected', {
        code: ErrorCode.DATABASE_CONNECTION_FAILED,
        context: { service: 'SqliteConnection', operation },
      });
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(error: Error, sql: string, operation: string): Error {
    const errorMessage = error.message.toLowerCase();
    const context = {
      service: 'SqliteConnection',
      operation,
      metadata: { sql, sqliteError: error.message },
    };

    // UNIQUE / PRIMARY KEY constraint violation
    if (errorMessage.includes('unique constraint')) {
      const match = errorMessage.match(/unique constraint failed: (\w+)\.(\w+)/i);
      return new DuplicateKeyError(
        match ? match[1] : 'unknown',
        match ? match[2] : 'unknown',
        context,
        error
      );
    }

    return new DatabaseError(`Database ${operation} failed: ${error.message}`, {
      retryable: true,
      context,
      cause: error,
    });
  }
}
