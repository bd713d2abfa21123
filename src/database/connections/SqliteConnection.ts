import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';
import { DatabaseConfig, DatabaseConnection, ExecuteResult, SqlParam } from '../../types/database.js';
import {
  DatabaseError,
  DuplicateKeyError,
  ForeignKeyViolationError,
  FileSystemError,
  QueryError,
  SchemaError,
  ErrorCode,
} from '../../errors/index.js';

const IN_MEMORY = ':memory:';

export class SqliteConnection implements DatabaseConnection {
  private db: sqlite3.Database | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const dbPath = this.config.filename;

    if (dbPath !== IN_MEMORY) {
      // The Chinook database is an external input; never create an empty one by accident
      if (!fs.existsSync(dbPath)) {
        throw new FileSystemError(
          `SQLite database not found: ${dbPath}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          path.resolve(dbPath),
          { service: 'SqliteConnection', operation: 'connect' }
        );
      }
    }

    const db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const handle = new sqlite3.Database(dbPath, sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE, err => {
        if (err) {
          reject(new DatabaseError(
            `Failed to connect to SQLite database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            {
              service: 'SqliteConnection',
              operation: 'connect',
              metadata: { dbPath },
            },
            err
          ));
        } else {
          resolve(handle);
        }
      });
    });

    this.db = db;

    // MusicVideo cascades depend on this; SQLite leaves it off per connection
    await this.execute('PRAGMA foreign_keys = ON');
  }

  async query<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const db = this.requireDb('query');

    return new Promise((resolve, reject) => {
      db.all<T>(sql, params, (err, rows) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'query'));
        } else {
          resolve(rows);
        }
      });
    });
  }

  async get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const db = this.requireDb('get');

    return new Promise((resolve, reject) => {
      db.get<T>(sql, params, (err, row) => {
        if (err) {
          reject(this.convertDatabaseError(err, sql, 'get'));
        } else {
          resolve(row);
        }
      });
    });
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<ExecuteResult> {
    const db = this.requireDb('execute');

    return new Promise((resolve, reject) => {
      // Store reference to class instance for error conversion
      const self = this;
      db.run(sql, params, function (err) {
        if (err) {
          reject(self.convertDatabaseError(err, sql, 'execute'));
        } else {
          // 'this' refers to the statement context, providing changes and lastID
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
          reject(new DatabaseError(
            `Failed to close database: ${err.message}`,
            ErrorCode.DATABASE_CONNECTION_FAILED,
            { service: 'SqliteConnection', operation: 'close' },
            err
          ));
        } else {
          this.db = null;
          resolve();
        }
      });
    });
  }

  private requireDb(operation: string): sqlite3.Database {
    if (!this.db) {
      throw new DatabaseError(
        'Database not connected',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        { service: 'SqliteConnection', operation }
      );
    }
    return this.db;
  }

  /**
   * Convert SQLite errors to ApplicationError types
   */
  private convertDatabaseError(error: Error, sql: string, operation: string): Error {
    return convertSqliteError(error, sql, operation);
  }
}

/**
 * Map a sqlite3 driver error onto the application error taxonomy.
 *
 * SQLite reports everything as SQLITE_ERROR / SQLITE_CONSTRAINT, so the
 * classification works off the message text.
 */
export function convertSqliteError(error: Error, sql: string, operation: string): Error {
  const errorMessage = error.message.toLowerCase();
  const context = {
    service: 'SqliteConnection',
    operation,
    metadata: { sql, sqliteError: error.message },
  };

  // UNIQUE or PRIMARY KEY violation, e.g. "UNIQUE constraint failed: MusicVideo.track_id"
  if (errorMessage.includes('unique constraint') || errorMessage.includes('primary key must be unique')) {
    const match = error.message.match(/unique constraint failed: (\w+)\.(\w+)/i);
    return new DuplicateKeyError(
      match?.[1] ?? 'unknown',
      match?.[2] ?? 'unknown',
      error.message,
      context
    );
  }

  // SQLite doesn't name the table or constraint for FOREIGN KEY failures
  if (errorMessage.includes('foreign key constraint')) {
    return new ForeignKeyViolationError('unknown', 'foreign_key', error.message, context);
  }

  const missingTable = error.message.match(/no such table: ([\w.]+)/i);
  if (missingTable?.[1]) {
    return new SchemaError(missingTable[1], undefined, error.message, context, error);
  }

  const missingColumn = error.message.match(/no such column: ([\w.]+)/i);
  if (missingColumn?.[1]) {
    const [table, column] = missingColumn[1].includes('.')
      ? missingColumn[1].split('.', 2)
      : ['unknown', missingColumn[1]];
    return new SchemaError(table ?? 'unknown', column, error.message, context, error);
  }

  return new QueryError(`Database ${operation} failed: ${error.message}`, context, error);
}
