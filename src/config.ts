/**
 * Runtime configuration
 *
 * `.env` in the working directory is loaded once by the CLI through
 * `loadEnvFile()`; `loadConfig()` then reads plain environment variables:
 * - YOUTUBE_API_KEY: Data API v3 key (required for `collect`)
 * - COMMENT_CODER_DB: SQLite path (default: ~/.comment-coder/comments.db)
 * - COMMENT_CODER_MAX_COMMENTS: Comments per video (default: 500)
 * - COMMENT_CODER_MAX_WORKERS: Videos fetched concurrently (default: 3)
 * - COMMENT_CODER_DEBUG_COLUMNS: Add rule/keyword columns to coding sheets (default: true)
 * - COMMENT_CODER_LOG_LEVEL: debug | info | warn | error (default: info)
 */

import { config as loadDotenv } from 'dotenv';
import { resolve } from 'path';
import type { AppConfig } from './types/index.js';
import { DEFAULT_CONFIG } from './types/index.js';
import { isLogLevel } from './utils/logger.js';

type Env = Record<string, string | undefined>;

export function loadEnvFile(cwd: string = process.cwd()): void {
  loadDotenv({ path: resolve(cwd, '.env') });
}

export function parseEnvPositiveInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : defaultValue;
}

export function parseEnvBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return defaultValue;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = env.YOUTUBE_API_KEY?.trim();
  const logLevel = env.COMMENT_CODER_LOG_LEVEL?.trim().toLowerCase() ?? '';

  return {
    ...DEFAULT_CONFIG,
    youtubeApiKey: apiKey ? apiKey : undefined,
    dbPath: env.COMMENT_CODER_DB?.trim() || DEFAULT_CONFIG.dbPath,
    maxComments: parseEnvPositiveInt(env.COMMENT_CODER_MAX_COMMENTS, DEFAULT_CONFIG.maxComments),
    maxWorkers: parseEnvPositiveInt(env.COMMENT_CODER_MAX_WORKERS, DEFAULT_CONFIG.maxWorkers),
    includeDebug: parseEnvBool(env.COMMENT_CODER_DEBUG_COLUMNS, DEFAULT_CONFIG.includeDebug),
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
  };
}
