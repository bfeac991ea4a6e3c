import { config as dotenvConfig } from 'dotenv';
import type { TaskOptions } from './types/task.js';

dotenvConfig();

export type TaskDefaults = Pick<
  TaskOptions,
  'continue' | 'split' | 'maxConnectionPerServer' | 'maxTries' | 'retryWait' | 'fileAllocation'
>;

export interface Config {
  port: number;
  host: string;
  aria2Path: string;
  downloadPath: string;
  killGracePeriodMs: number;
  maxLogLines: number;
  debug: boolean;
  taskDefaults: TaskDefaults;
}

let config: Config | null = null;

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseOptionalInteger(value: string | undefined): number | undefined {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function getConfig(): Config {
  if (!config) {
    config = {
      port: parseInteger(process.env.PORT, 9119),
      host: process.env.HOST || '0.0.0.0',
      aria2Path: process.env.ARIA2_PATH || 'aria2c',
      downloadPath: process.env.DOWNLOAD_PATH || './downloads',
      killGracePeriodMs: parseInteger(process.env.KILL_GRACE_PERIOD_MS, 10000),
      maxLogLines: parseInteger(process.env.MAX_LOG_LINES, 5000),
      debug: process.env.DEBUG === 'true' || process.env.NODE_ENV === 'development',
      taskDefaults: {
        continue: process.env.DEFAULT_CONTINUE !== 'false',
        split: parseInteger(process.env.DEFAULT_SPLIT, 4),
        // Unset: aria2c gets --max-connection-per-server equal to --split
        maxConnectionPerServer: parseOptionalInteger(process.env.DEFAULT_MAX_CONNECTION_PER_SERVER),
        maxTries: parseOptionalInteger(process.env.DEFAULT_MAX_TRIES ?? '5'),
        retryWait: parseOptionalInteger(process.env.DEFAULT_RETRY_WAIT),
        fileAllocation: process.env.DEFAULT_FILE_ALLOCATION || 'none',
      },
    };
  }
  return config;
}

export function reloadConfig(): void {
  config = null;
  getConfig();
}
