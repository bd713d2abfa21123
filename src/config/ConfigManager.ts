import dotenv from 'dotenv';
import { AppConfig, DatabaseConfig, LoggingConfig, ReportConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Database configuration
    config.database.type = this.getEnum('DB_TYPE', config.database.type, ['sqlite3']);
    config.database.filename = this.getString('DB_FILE', config.database.filename);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Report parameters
    config.reports.purchaseLimit = this.getPositiveInt(
      'REPORT_PURCHASE_LIMIT',
      config.reports.purchaseLimit
    );
    config.reports.maxTrackDurationMs = this.getPositiveInt(
      'REPORT_MAX_TRACK_MS',
      config.reports.maxTrackDurationMs
    );
    config.reports.topGenreCount = this.getPositiveInt(
      'REPORT_TOP_GENRES',
      config.reports.topGenreCount
    );

    return config;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = process.env[key];
    if (value) {
      return value;
    }
    if (defaultValue === undefined) {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }

  private getPositiveInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a positive integer`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getReportConfig(): ReportConfig {
    return this.config.reports;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }
}
