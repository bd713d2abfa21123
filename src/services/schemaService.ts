import { DatabaseConnection, MigrationInterface } from '../types/database.js';
import { MusicVideoMigration } from '../database/migrations/20261018_001_music_video.js';
import { SchemaError } from '../errors/index.js';
import { logger } from '../utils/logger.js';

interface TableColumn {
  name: string;
}

const REFERENCED_TABLE = 'tracks';
const REFERENCED_COLUMN = 'TrackId';

/**
 * Creates the MusicVideo table on top of an existing Chinook catalog
 */
export class SchemaService {
  constructor(
    private readonly db: DatabaseConnection,
    private readonly migration: MigrationInterface = MusicVideoMigration
  ) {}

  /**
   * Drop and recreate MusicVideo. Safe to call repeatedly; existing videos are lost.
   *
   * SQLite accepts a foreign key to a table that does not exist and only
   * fails later on insert, so the referenced column is checked up front.
   */
  async initialize(): Promise<void> {
    await this.assertReferencedColumn();
    await this.migration.up(this.db);
  }

  async drop(): Promise<void> {
    await this.migration.down(this.db);
  }

  async tableExists(table: string): Promise<boolean> {
    const row = await this.db.get<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
      [table]
    );
    return row !== undefined;
  }

  private async assertReferencedColumn(): Promise<void> {
    const columns = await this.db.query<TableColumn>(`PRAGMA table_info(${REFERENCED_TABLE})`);

    if (columns.length === 0) {
      logger.error('Referenced table missing', { table: REFERENCED_TABLE });
      throw new SchemaError(REFERENCED_TABLE, undefined, undefined, {
        service: 'SchemaService',
        operation: 'initialize',
      });
    }

    if (!columns.some(col => col.name === REFERENCED_COLUMN)) {
      logger.error('Referenced column missing', {
        table: REFERENCED_TABLE,
        column: REFERENCED_COLUMN,
      });
      throw new SchemaError(REFERENCED_TABLE, REFERENCED_COLUMN, undefined, {
        service: 'SchemaService',
        operation: 'initialize',
      });
    }
  }
}
