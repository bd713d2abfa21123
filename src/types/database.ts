export type DatabaseType = 'sqlite3';

/**
 * Valid SQL parameter types
 * Includes undefined for optional parameters
 */
export type SqlParam = string | number | boolean | null | undefined | Buffer;

export interface DatabaseConfig {
  type: DatabaseType;
  filename: string;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId?: number;
}

export interface DatabaseConnection {
  connect?(): Promise<void>;
  query<T>(sql: string, params?: SqlParam[]): Promise<T[]>;
  get<T>(sql: string, params?: SqlParam[]): Promise<T | undefined>;
  execute(sql: string, params?: SqlParam[]): Promise<ExecuteResult>;
  close(): Promise<void>;
}

export interface MigrationInterface {
  up(db: DatabaseConnection): Promise<void>;
  down(db: DatabaseConnection): Promise<void>;
}
