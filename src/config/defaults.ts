import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  database: {
    type: 'sqlite3',
    filename: './data/chinook.db',
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  reports: {
    purchaseLimit: 50,
    maxTrackDurationMs: 900_000, // 15 minutes
    topGenreCount: 5,
  },
};
