export type { DatabaseConfig } from '../config/types.js';

/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number;
}

export interface DatabaseConnection {
  connect?(): Promise<void>;
  query<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  close(): Promise<void>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface MigrationDefinition {
  version: string;
  name: string;
  up(db: DatabaseConnection): Promise<void>;
  down(db: DatabaseConnection): Promise<void>;
}
