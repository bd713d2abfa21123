import { DatabaseConnection } from '../../types/database.js';
import {
  AccentedTrack,
  AccentedTrackRow,
  GenreTrack,
  GenreTrackRow,
} from '../../types/chinook.js';
import { defaultConfig } from '../../config/defaults.js';
import { accentCharactersSchema, topGenreCountSchema } from '../../validation/reportSchemas.js';
import { validate } from '../../validation/validate.js';
import { logger } from '../../utils/logger.js';

/**
 * Acute-accented vowels, both cases listed explicitly (no case folding)
 */
export const ACCENTED_VOWELS: readonly string[] = ['á', 'é', 'í', 'ó', 'ú', 'Á', 'É', 'Í', 'Ó', 'Ú'];

/**
 * Catalog reports over tracks and genres
 */
export class TrackReportService {
  constructor(private readonly db: DatabaseConnection) {}

  /**
   * Tracks whose name contains any of `accents` anywhere, ordered by name
   */
  async findAccentedTracks(accents: readonly string[] = ACCENTED_VOWELS): Promise<AccentedTrack[]> {
    const characters = validate(accentCharactersSchema, accents, {
      service: 'TrackReportService',
      operation: 'findAccentedTracks',
    });

    // instr() compares code points, so 'ó' never matches 'Ó' or 'o'
    const conditions = characters.map(() => 'instr(Name, ?) > 0').join(' OR ');

    const rows = await this.db.query<AccentedTrackRow>(
      `SELECT TrackId, Name
       FROM tracks
       WHERE ${conditions}
       ORDER BY Name`,
      characters
    );

    logger.debug('[TrackReportService] Accented tracks', { count: rows.length });

    return rows.map(row => ({ trackId: row.TrackId, name: row.Name }));
  }

  /**
   * Every track whose genre is missing or outside the `topCount` genres with the
   * largest total duration. Ties in the ranking go to the lower GenreId.
   */
  async getTracksOutsideTopGenres(
    topCount: number = defaultConfig.reports.topGenreCount
  ): Promise<GenreTrack[]> {
    const limit = validate(topGenreCountSchema, topCount, {
      service: 'TrackReportService',
      operation: 'getTracksOutsideTopGenres',
    });

    const rows = await this.db.query<GenreTrackRow>(
      `WITH genre_totals AS (
         SELECT GenreId, SUM(Milliseconds) AS TotalMs
         FROM tracks
         WHERE GenreId IS NOT NULL
         GROUP BY GenreId
       ),
       top_genres AS (
         SELECT GenreId
         FROM genre_totals
         ORDER BY TotalMs DESC, GenreId
         LIMIT ?
       )
       SELECT t.TrackId, t.Name, g.Name AS Genre, t.Milliseconds
       FROM tracks t
       LEFT JOIN genres g ON g.GenreId = t.GenreId
       WHERE t.GenreId IS NULL
          OR t.GenreId NOT IN (SELECT GenreId FROM top_genres)
       ORDER BY Genre, t.Name`,
      [limit]
    );

    logger.debug('[TrackReportService] Tracks outside top genres', {
      topCount: limit,
      count: rows.length,
    });

    return rows.map(row => ({
      trackId: row.TrackId,
      name: row.Name,
      genre: row.Genre,
      milliseconds: row.Milliseconds,
    }));
  }
}
