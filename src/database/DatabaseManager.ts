import { DatabaseConfig, DatabaseConnection } from '../types/database.js';
import { SqliteConnection } from './connections/SqliteConnection.js';
import { logger } from '../utils/logger.js';
import { DatabaseError, ErrorCode } from '../errors/index.js';

/**
 * Owns the single connection used by the command-line runner.
 *
 * Library callers that already hold a DatabaseConnection can skip this class
 * and hand the connection straight to the services.
 */
export class DatabaseManager {
  private connection: DatabaseConnection | null = null;
  private config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }

    const connection = this.createConnection();
    await connection.connect?.();
    this.connection = connection;

    logger.info('Connected to database', {
      type: this.config.type,
      filename: this.config.filename,
    });
  }

  async disconnect(): Promise<void> {
    if (this.connection) {
      await this.connection.close();
      this.connection = null;
      logger.info('Disconnected from database');
    }
  }

  getConnection(): DatabaseConnection {
    if (!this.connection) {
      throw new DatabaseError(
        'Database not connected. Call connect() first.',
        ErrorCode.DATABASE_CONNECTION_FAILED,
        {
          service: 'DatabaseManager',
          operation: 'getConnection'
        }
      );
    }
    return this.connection;
  }

  private createConnection(): DatabaseConnection {
    switch (this.config.type) {
      case 'sqlite3':
        return new SqliteConnection(this.config);
      default:
        throw new DatabaseError(
          `Unsupported database type: ${String(this.config.type)}`,
          ErrorCode.DATABASE_CONNECTION_FAILED,
          {
            service: 'DatabaseManager',
            operation: 'connect',
            metadata: { requestedType: this.config.type }
          }
        );
    }
  }
}
