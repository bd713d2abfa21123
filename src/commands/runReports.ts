import { ReportConfig } from '../config/types.js';
import { DatabaseManager } from '../database/DatabaseManager.js';
import { ScriptRunner, ScriptRunResult } from '../services/scriptRunner.js';
import { logger } from '../utils/logger.js';
import { createErrorLogContext, getErrorMessage } from '../utils/errorHandling.js';

/**
 * Open the database, run every step and close it again.
 *
 * A failed disconnect is logged but never replaces the run's own error.
 */
export async function runReports(
  dbManager: DatabaseManager,
  reports: Partial<ReportConfig> = {}
): Promise<ScriptRunResult> {
  try {
    await dbManager.connect();

    const runner = new ScriptRunner(dbManager.getConnection(), { reports });
    return await runner.run();
  } finally {
    try {
      await dbManager.disconnect();
    } catch (error) {
      logger.warn('Failed to disconnect from database', createErrorLogContext(error));
    }
  }
}

/**
 * Report a failed run on stderr as well as the log; the logger may have no
 * transports at all.
 */
export function reportFailure(error: unknown): void {
  logger.error('Run failed', createErrorLogContext(error));
  console.error('❌ Run failed:', getErrorMessage(error));
}

export function renderResult(result: ScriptRunResult): void {
  const { seed, additionalVideoInserted, reports } = result;

  console.log(`\n🎬 Music videos inserted: ${seed.totalInserted + additionalVideoInserted}`);
  if (seed.unmatched.length > 0) {
    console.log(`⚠️  No track found for: ${seed.unmatched.join(', ')}`);
  }

  console.log('\n📋 Tracks with accented vowels');
  console.table(reports.accentedTracks);

  console.log('\n🧾 Latest purchases');
  console.table(reports.purchaseDetails);

  console.log('\n💰 Revenue by genre');
  console.table(reports.revenueByGenre);

  console.log('\n⏱️  Customers who bought longer-than-average tracks');
  console.table(reports.aboveAverageDurationPurchasers);

  console.log('\n🎧 Tracks outside the top genres by total duration');
  console.table(reports.tracksOutsideTopGenres);
}
