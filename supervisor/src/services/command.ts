import * as fs from 'fs';
import * as path from 'path';
import { tokenizeArgs } from '../utils/args.js';
import { DirectoryCreationError } from '../utils/errors.js';
import type { TaskConfig } from '../types/task.js';

export interface Command {
  command: string;
  args: string[];
}

/**
 * Build the aria2c argument vector for a task (executable not included)
 */
export function buildArguments(config: TaskConfig): string[] {
  const { options } = config;
  const args: string[] = [];

  // -c: continue a partial download left by a previous run
  if (options.continue) {
    args.push('-c');
  }

  args.push(`--file-allocation=${options.fileAllocation || 'none'}`);

  const split = options.split;
  const maxConnections = options.maxConnectionPerServer ?? split;
  args.push(`--split=${split}`, `--max-connection-per-server=${maxConnections}`);

  if (options.maxTries !== undefined) {
    args.push(`--max-tries=${options.maxTries}`);
  }
  if (options.retryWait !== undefined) {
    args.push(`--retry-wait=${options.retryWait}`);
  }
  if (options.maxDownloadLimit) {
    args.push(`--max-download-limit=${options.maxDownloadLimit}`);
  }
  if (options.maxUploadLimit) {
    args.push(`--max-upload-limit=${options.maxUploadLimit}`);
  }
  if (options.referer) {
    args.push(`--referer=${options.referer}`);
  }
  if (options.userAgent) {
    args.push(`--user-agent=${options.userAgent}`);
  }

  for (const line of options.headers) {
    const header = line.trim();
    if (header) {
      args.push(`--header=${header}`);
    }
  }

  // Restarting must overwrite the partial file, never create "file.1"
  args.push('--allow-overwrite=true', '--auto-file-renaming=false');

  if (config.outputName) {
    args.push('-d', config.outputDir, '-o', config.outputName);
  } else {
    args.push('-d', config.outputDir);
  }

  if (options.extraArgs) {
    args.push(...tokenizeArgs(options.extraArgs));
  }

  args.push(config.url);

  return args;
}

/**
 * Where the downloaded file ends up, as far as we know before aria2c runs
 */
export function resolveSavePath(config: TaskConfig): string {
  return config.outputName ? path.join(config.outputDir, config.outputName) : config.outputDir;
}

export async function ensureOutputDirectory(directory: string): Promise<void> {
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new DirectoryCreationError(directory, error);
  }
}

/**
 * Create the output directory, then build the full command
 */
export async function prepareCommand(executable: string, config: TaskConfig): Promise<Command> {
  await ensureOutputDirectory(config.outputDir);
  return { command: executable, args: buildArguments(config) };
}
