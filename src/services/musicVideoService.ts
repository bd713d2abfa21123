import { DatabaseConnection } from '../types/database.js';
import {
  MusicVideo,
  MusicVideoRow,
  MusicVideoSeed,
  SeedEntryResult,
  SeedResult,
} from '../types/chinook.js';
import { DEFAULT_MUSIC_VIDEO_SEEDS } from '../database/seeds/musicVideoSeeds.js';
import { musicVideoSeedListSchema, musicVideoSeedSchema } from '../validation/musicVideoSchemas.js';
import { validate } from '../validation/validate.js';
import { logger } from '../utils/logger.js';
import { createErrorLogContext } from '../utils/errorHandling.js';

/**
 * MusicVideoService
 *
 * Inserts videos by track name so seed data never hardcodes TrackId values.
 */
export class MusicVideoService {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Insert one video per seed entry, in order.
   *
   * A name that matches no track inserts nothing; a name shared by several
   * tracks gives each of them a video. The first failing insert (typically a
   * DuplicateKeyError on a re-run) stops the batch; rows already inserted stay.
   */
  async seed(entries: readonly MusicVideoSeed[] = DEFAULT_MUSIC_VIDEO_SEEDS): Promise<SeedResult> {
    const seeds = validate(musicVideoSeedListSchema, entries, {
      service: 'MusicVideoService',
      operation: 'seed',
    });

    logger.info('Seeding music videos', { count: seeds.length });

    const results: SeedEntryResult[] = [];
    for (const entry of seeds) {
      const inserted = await this.insertByTrackName(entry);
      results.push({ ...entry, inserted });
    }

    const unmatched = results.filter(r => r.inserted === 0).map(r => r.trackName);
    if (unmatched.length > 0) {
      logger.warn('Seed entries matched no track', { unmatched });
    }

    const totalInserted = results.reduce((sum, r) => sum + r.inserted, 0);
    logger.info('Music video seeding complete', { totalInserted });

    return { entries: results, totalInserted, unmatched };
  }

  /**
   * Add a video for every track named `trackName`
   * @returns number of rows inserted (0 when no track has that name)
   */
  async addVideoForTrack(trackName: string, director: string): Promise<number> {
    const entry = validate(musicVideoSeedSchema, { trackName, director }, {
      service: 'MusicVideoService',
      operation: 'addVideoForTrack',
    });
    return this.insertByTrackName(entry);
  }

  async listVideos(): Promise<MusicVideo[]> {
    const rows = await this.db.query<MusicVideoRow>(
      `SELECT mv.track_id, t.Name AS track_name, mv.video_director
       FROM MusicVideo mv
       JOIN tracks t ON t.TrackId = mv.track_id
       ORDER BY mv.track_id`
    );
    return rows.map(mapMusicVideo);
  }

  async findByTrackId(trackId: number): Promise<MusicVideo | null> {
    const row = await this.db.get<MusicVideoRow>(
      `SELECT mv.track_id, t.Name AS track_name, mv.video_director
       FROM MusicVideo mv
       JOIN tracks t ON t.TrackId = mv.track_id
       WHERE mv.track_id = ?`,
      [trackId]
    );
    return row ? mapMusicVideo(row) : null;
  }

  async countVideos(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) AS count FROM MusicVideo');
    return row?.count ?? 0;
  }

  private async insertByTrackName(entry: MusicVideoSeed): Promise<number> {
    try {
      const result = await this.db.execute(
        `INSERT INTO MusicVideo (track_id, video_director)
         SELECT TrackId, ? FROM tracks
         WHERE Name = ?`,
        [entry.director, entry.trackName]
      );

      logger.debug('Inserted music video', {
        trackName: entry.trackName,
        director: entry.director,
        inserted: result.affectedRows,
      });

      return result.affectedRows;
    } catch (error) {
      logger.error('Failed to insert music video', createErrorLogContext(error, {
        trackName: entry.trackName,
      }));
      throw error;
    }
  }
}

function mapMusicVideo(row: MusicVideoRow): MusicVideo {
  return {
    trackId: row.track_id,
    trackName: row.track_name,
    director: row.video_director,
  };
}
