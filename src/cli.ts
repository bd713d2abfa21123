#!/usr/bin/env node
import { ConfigManager } from './config/ConfigManager.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { renderResult, reportFailure, runReports } from './commands/runReports.js';
import { initializeLogger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = ConfigManager.getInstance().getConfig();
  initializeLogger();

  const result = await runReports(new DatabaseManager(config.database), config.reports);
  renderResult(result);
}

main().catch((error: unknown) => {
  reportFailure(error);
  process.exitCode = 1;
});
