import { DownloadTask, type TaskSettings } from './task.js';
import {
  InvalidOperationError,
  InvalidTaskConfigError,
  TaskNotFoundError,
} from '../utils/errors.js';
import type { TaskDefaults } from '../config.js';
import type {
  LifecycleResult,
  LifecycleVerb,
  TaskConfig,
  TaskConfigInput,
  TaskDetails,
  TaskOptions,
  TaskSummary,
} from '../types/task.js';

export const DEFAULT_LOG_LINES = 100;

export interface RegistryOptions extends TaskSettings {
  downloadPath: string;
  taskDefaults: TaskDefaults;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireInteger(value: number | undefined, field: string, min: number): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidTaskConfigError(`${field} must be an integer >= ${min}, got ${value}`);
  }
}

/**
 * Fill a task request with the configured defaults and check it
 */
export function normalizeTaskConfig(
  input: TaskConfigInput,
  defaults: Pick<RegistryOptions, 'downloadPath' | 'taskDefaults'>
): TaskConfig {
  const url = input.url.trim();
  if (!url) {
    throw new InvalidTaskConfigError('url is required');
  }

  const requested = input.options ?? {};
  const fallback = defaults.taskDefaults;

  const options: TaskOptions = {
    continue: requested.continue ?? fallback.continue,
    split: requested.split ?? fallback.split,
    maxConnectionPerServer: requested.maxConnectionPerServer ?? fallback.maxConnectionPerServer,
    maxTries: requested.maxTries ?? fallback.maxTries,
    retryWait: requested.retryWait ?? fallback.retryWait,
    maxDownloadLimit: optionalString(requested.maxDownloadLimit),
    maxUploadLimit: optionalString(requested.maxUploadLimit),
    referer: optionalString(requested.referer),
    userAgent: optionalString(requested.userAgent),
    headers: [...(requested.headers ?? [])],
    fileAllocation: optionalString(requested.fileAllocation) ?? fallback.fileAllocation,
    extraArgs: requested.extraArgs?.trim() ?? '',
  };

  requireInteger(options.split, 'split', 1);
  requireInteger(options.maxConnectionPerServer, 'maxConnectionPerServer', 1);
  requireInteger(options.maxTries, 'maxTries', 0);
  requireInteger(options.retryWait, 'retryWait', 0);

  return {
    url,
    outputDir: optionalString(input.outputDir) ?? defaults.downloadPath,
    outputName: input.outputName?.trim() ?? '',
    options,
  };
}

/**
 * Ordered collection of tasks. Ids come from a counter and are never
 * reused, so an id stays valid until its task is removed.
 */
export class TaskRegistry {
  private readonly tasks = new Map<number, DownloadTask>();
  private nextId = 1;

  constructor(private readonly options: RegistryOptions) {}

  get size(): number {
    return this.tasks.size;
  }

  add(input: TaskConfigInput): number {
    const config = normalizeTaskConfig(input, this.options);
    const id = this.nextId++;
    this.tasks.set(id, new DownloadTask(id, config, this.options));
    console.log(`[TaskRegistry] Task added: #${id} ${config.url}`);
    return id;
  }

  get(id: number): DownloadTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new TaskNotFoundError(id);
    }
    return task;
  }

  remove(id: number): void {
    const task = this.get(id);
    if (task.getStatus() === 'downloading') {
      throw new InvalidOperationError(`Task ${id} is downloading, stop it first`);
    }

    // e.g. a process still running after it reported completion
    task.dispose();
    this.tasks.delete(id);
    console.log(`[TaskRegistry] Task deleted: #${id} ${task.url}`);
  }

  list(): TaskSummary[] {
    return Array.from(this.tasks.values()).map(task => task.summary());
  }

  details(id: number): TaskDetails {
    return this.get(id).snapshot();
  }

  getLog(id: number, maxLines: number = DEFAULT_LOG_LINES): string[] {
    return this.get(id).tail(maxLines);
  }

  runningCount(): number {
    return Array.from(this.tasks.values()).filter(task => task.isRunning()).length;
  }

  async dispatch(id: number, verb: LifecycleVerb): Promise<LifecycleResult> {
    const task = this.get(id);
    console.log(`[TaskRegistry] ${verb} #${id}: ${task.url}`);

    switch (verb) {
      case 'start':
        return task.start();
      case 'pause':
        return task.pause();
      case 'resume':
        return task.resume();
      case 'stop':
        return task.stop();
      case 'delete':
        this.remove(id);
        return { success: true, message: 'Task deleted' };
    }
  }

  /**
   * Stop every running task and wait for the processes to go away
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.tasks.values()).filter(task => task.isRunning());
    if (running.length > 0) {
      console.log(`[TaskRegistry] Stopping ${running.length} running task(s)`);
    }
    for (const task of running) {
      task.stop();
    }
    await Promise.all(running.map(task => task.waitForExit()));
  }
}
