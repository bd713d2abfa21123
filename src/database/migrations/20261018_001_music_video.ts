import { DatabaseConnection } from '../../types/database.js';
import { logger } from '../../utils/logger.js';

/**
 * MusicVideo Migration
 *
 * A MusicVideo "is a" Track: it cannot exist without one, and each track has
 * at most one video (track_id is the primary key). Deleting or renumbering a
 * track cascades to its video.
 *
 * up() drops any previous MusicVideo table, so re-running it resets the data.
 */
export class MusicVideoMigration {
  static version = '20261018_001';
  static migrationName = 'music_video';

  static async up(db: DatabaseConnection): Promise<void> {
    logger.info('Running migration: Create MusicVideo table');

    await db.execute('DROP TABLE IF EXISTS MusicVideo');

    await db.execute(`
      CREATE TABLE MusicVideo (
        track_id        INTEGER PRIMARY KEY,
        video_director  TEXT NOT NULL CHECK (length(trim(video_director)) > 0),
        FOREIGN KEY (track_id) REFERENCES tracks(TrackId)
          ON DELETE CASCADE
          ON UPDATE CASCADE
      )
    `);

    logger.info('Created table: MusicVideo');
  }

  static async down(db: DatabaseConnection): Promise<void> {
    await db.execute('DROP TABLE IF EXISTS MusicVideo');
    logger.info('Dropped table: MusicVideo');
  }
}
