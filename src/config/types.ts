import { DatabaseConfig } from '../types/database.js';

export type { DatabaseConfig };

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface ReportConfig {
  purchaseLimit: number;
  maxTrackDurationMs: number; // duration cap for the average-duration report
  topGenreCount: number;
}

export interface AppConfig {
  database: DatabaseConfig;
  logging: LoggingConfig;
  reports: ReportConfig;
}
