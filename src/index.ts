/**
 * @module chinook-reports
 * MusicVideo seeding and sales reports for the Chinook sample database
 */

export { ScriptRunner } from './services/scriptRunner.js';
export type { ScriptRunnerOptions, ScriptRunResult, ReportResults } from './services/scriptRunner.js';
export { SchemaService } from './services/schemaService.js';
export { MusicVideoService } from './services/musicVideoService.js';
export { TrackReportService, SalesReportService, ACCENTED_VOWELS } from './services/reports/index.js';
export { DEFAULT_MUSIC_VIDEO_SEEDS, VOODOO_MUSIC_VIDEO } from './database/seeds/musicVideoSeeds.js';
export { DatabaseManager } from './database/DatabaseManager.js';
export { SqliteConnection } from './database/connections/SqliteConnection.js';
export { ConfigManager } from './config/ConfigManager.js';
export { logger, initializeLogger } from './utils/logger.js';
export * from './errors/index.js';
export type * from './types/chinook.js';
export type * from './types/database.js';
