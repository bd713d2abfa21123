import { DatabaseConnection } from '../types/database.js';
import {
  AccentedTrack,
  CustomerSummary,
  GenreRevenue,
  GenreTrack,
  MusicVideoSeed,
  PurchaseDetail,
  SeedResult,
} from '../types/chinook.js';
import { ReportConfig } from '../config/types.js';
import { defaultConfig } from '../config/defaults.js';
import { DEFAULT_MUSIC_VIDEO_SEEDS, VOODOO_MUSIC_VIDEO } from '../database/seeds/musicVideoSeeds.js';
import { SchemaService } from './schemaService.js';
import { MusicVideoService } from './musicVideoService.js';
import { SalesReportService, TrackReportService } from './reports/index.js';
import { logger } from '../utils/logger.js';
import { createErrorLogContext } from '../utils/errorHandling.js';

export interface ScriptRunnerOptions {
  seeds?: readonly MusicVideoSeed[];
  /** Inserted on its own after the seed batch */
  additionalVideo?: MusicVideoSeed;
  reports?: Partial<ReportConfig>;
}

export interface ReportResults {
  accentedTracks: AccentedTrack[];
  purchaseDetails: PurchaseDetail[];
  revenueByGenre: GenreRevenue[];
  aboveAverageDurationPurchasers: CustomerSummary[];
  tracksOutsideTopGenres: GenreTrack[];
}

export interface ScriptRunResult {
  seed: SeedResult;
  additionalVideoInserted: number;
  reports: ReportResults;
  completedSteps: string[];
}

/**
 * Runs the full sequence against one connection: create MusicVideo, seed it,
 * then produce every report.
 *
 * Steps run strictly in order. The first failure is logged and rethrown as-is
 * and nothing after it runs. The connection is owned by the caller.
 */
export class ScriptRunner {
  private readonly schema: SchemaService;
  private readonly videos: MusicVideoService;
  private readonly tracks: TrackReportService;
  private readonly sales: SalesReportService;
  private readonly seeds: readonly MusicVideoSeed[];
  private readonly additionalVideo: MusicVideoSeed;
  private readonly reportConfig: ReportConfig;
  private completedSteps: string[] = [];

  constructor(db: DatabaseConnection, options: ScriptRunnerOptions = {}) {
    this.schema = new SchemaService(db);
    this.videos = new MusicVideoService(db);
    this.tracks = new TrackReportService(db);
    this.sales = new SalesReportService(db);
    this.seeds = options.seeds ?? DEFAULT_MUSIC_VIDEO_SEEDS;
    this.additionalVideo = options.additionalVideo ?? VOODOO_MUSIC_VIDEO;
    this.reportConfig = { ...defaultConfig.reports, ...options.reports };
  }

  async run(): Promise<ScriptRunResult> {
    this.completedSteps = [];
    const startTime = Date.now();

    await this.step('initialize-schema', () => this.schema.initialize());

    const seed = await this.step('seed-music-videos', () => this.videos.seed(this.seeds));

    const additionalVideoInserted = await this.step('add-music-video', () =>
      this.videos.addVideoForTrack(this.additionalVideo.trackName, this.additionalVideo.director)
    );

    const accentedTracks = await this.step('accented-tracks', () =>
      this.tracks.findAccentedTracks()
    );

    const purchaseDetails = await this.step('purchase-details', () =>
      this.sales.getPurchaseDetails(this.reportConfig.purchaseLimit)
    );

    const revenueByGenre = await this.step('revenue-by-genre', () =>
      this.sales.getRevenueByGenre()
    );

    const aboveAverageDurationPurchasers = await this.step('above-average-duration-purchasers', () =>
      this.sales.getAboveAverageDurationPurchasers(this.reportConfig.maxTrackDurationMs)
    );

    const tracksOutsideTopGenres = await this.step('tracks-outside-top-genres', () =>
      this.tracks.getTracksOutsideTopGenres(this.reportConfig.topGenreCount)
    );

    logger.info('Script run complete', {
      steps: this.completedSteps.length,
      durationMs: Date.now() - startTime,
    });

    return {
      seed,
      additionalVideoInserted,
      reports: {
        accentedTracks,
        purchaseDetails,
        revenueByGenre,
        aboveAverageDurationPurchasers,
        tracksOutsideTopGenres,
      },
      completedSteps: [...this.completedSteps],
    };
  }

  private async step<T>(name: string, action: () => Promise<T>): Promise<T> {
    const startTime = Date.now();
    logger.info(`Running step: ${name}`);

    try {
      const result = await action();
      this.completedSteps.push(name);
      logger.info(`Step completed: ${name}`, { durationMs: Date.now() - startTime });
      return result;
    } catch (error) {
      logger.error(`Step failed: ${name}`, createErrorLogContext(error, {
        step: name,
        completedSteps: [...this.completedSteps],
      }));
      throw error;
    }
  }
}
