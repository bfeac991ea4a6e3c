import { prepareCommand, resolveSavePath, type Command } from './command.js';
import {
  createLineReader,
  isProcessAlive,
  spawnProcess,
  waitForSpawn,
  type ProcessLauncher,
  type SupervisedProcess,
} from './process.js';
import { isCompletionLine, parseProgressLine } from '../utils/progress.js';
import { appendBounded, formatLogEntry } from '../utils/log.js';
import { errorMessage } from '../utils/errors.js';
import { formatBytes } from '../utils/units.js';
import type {
  LifecycleResult,
  ProgressUpdate,
  TaskConfig,
  TaskDetails,
  TaskStatus,
  TaskSummary,
} from '../types/task.js';

const DISPLAY_URL_LENGTH = 80;

export interface TaskSettings {
  executable: string;
  launcher?: ProcessLauncher;
  killGracePeriodMs?: number; // SIGKILL after this long without exit, 0 = never
  maxLogLines?: number;       // 0 = unbounded
  debug?: boolean;            // Mirror child output to the console
}

function cloneConfig(config: TaskConfig): TaskConfig {
  return {
    ...config,
    options: { ...config.options, headers: [...config.options.headers] },
  };
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  return code !== null ? `code ${code}` : `signal ${signal ?? 'unknown'}`;
}

/**
 * One aria2c download: owns at most one child process at a time, the
 * reader draining its output, the parsed progress and the task log.
 */
export class DownloadTask {
  private config: TaskConfig;
  private status: TaskStatus = 'waiting';

  private process: SupervisedProcess | null = null;
  private exited: Promise<void> = Promise.resolve();
  private killTimer: NodeJS.Timeout | null = null;
  private stopRequested = false;
  private starting = false;
  private startCancelled = false;

  private gid: string | null = null;
  private progress = 0;
  private downloadedBytes = 0;
  private totalBytes = 0;
  private speed = '';
  private eta = '';
  private connections = 0;

  private spawnCount = 0;
  private readonly createdAt = new Date();
  private startedAt: Date | null = null;
  private finishedAt: Date | null = null;
  private readonly logLines: string[] = [];

  constructor(
    readonly id: number,
    config: TaskConfig,
    private readonly settings: TaskSettings
  ) {
    this.config = cloneConfig(config);
  }

  get url(): string {
    return this.config.url;
  }

  getStatus(): TaskStatus {
    return this.status;
  }

  /**
   * A child process is running and nobody asked it to stop
   */
  isRunning(): boolean {
    return this.process !== null && !this.stopRequested && isProcessAlive(this.process);
  }

  /**
   * Spawn aria2c for this task
   */
  async start(): Promise<LifecycleResult> {
    if (this.starting || this.isRunning()) {
      return this.reject('Task is already in progress.');
    }

    this.starting = true;
    this.startCancelled = false;
    try {
      // A paused or stopped process may still be shutting down
      await this.exited;

      let command: Command;
      try {
        command = await prepareCommand(this.settings.executable, this.config);
      } catch (error) {
        return this.fail(`Failed to start: ${errorMessage(error)}`);
      }

      if (this.startCancelled) {
        return this.reject('Start cancelled');
      }

      this.log(`Start command: ${[command.command, ...command.args].join(' ')}`);
      console.log(`[Task #${this.id}] Starting: ${this.config.url}`);

      let proc: SupervisedProcess;
      try {
        proc = (this.settings.launcher ?? spawnProcess)(command.command, command.args);
      } catch (error) {
        return this.fail(`Failed to start: ${errorMessage(error)}`);
      }

      this.stopRequested = false;
      this.attach(proc);

      const spawnError = await waitForSpawn(proc);
      if (spawnError) {
        // attach() records the failure and sets the error status
        await this.exited;
        return { success: false, message: `Failed to start: ${spawnError.message}` };
      }

      this.spawnCount += 1;
      this.startedAt = new Date();
      this.finishedAt = null;

      // Paused, stopped or removed while the process was coming up
      if (this.stopRequested || this.startCancelled) {
        if (!this.stopRequested) {
          this.terminate();
        }
        return this.reject('Start cancelled');
      }

      this.status = 'downloading';
      return { success: true, message: 'Download started' };
    } finally {
      this.starting = false;
    }
  }

  /**
   * Terminate the process but keep the partial file for resume
   */
  pause(): LifecycleResult {
    if (!this.isRunning()) {
      if (!this.starting) {
        return this.reject('No running process to pause');
      }
      this.startCancelled = true;
    } else {
      this.terminate();
    }

    this.log('Download paused');
    this.status = 'paused';
    console.log(`[Task #${this.id}] Paused at ${formatBytes(this.downloadedBytes)}`);
    return { success: true, message: 'Download paused' };
  }

  stop(): LifecycleResult {
    if (this.starting) {
      this.startCancelled = true;
    }
    if (this.isRunning()) {
      this.terminate();
      this.log('Download stopped');
      console.log(`[Task #${this.id}] Stopped`);
    }
    this.status = 'stopped';
    return { success: true, message: 'Download stopped' };
  }

  /**
   * Restart aria2c with -c so it picks up the partial file
   */
  async resume(): Promise<LifecycleResult> {
    if (this.status === 'completed') {
      return this.reject('Task already completed, no need to resume');
    }
    if (this.starting || this.isRunning()) {
      return this.reject('Task is still running, cannot resume');
    }

    this.log('Resuming download');
    this.config = {
      ...this.config,
      options: { ...this.config.options, continue: true },
    };
    return this.start();
  }

  /**
   * Terminate whatever process is left before the task is dropped
   */
  dispose(): void {
    if (this.starting) {
      this.startCancelled = true;
    }
    if (this.process && isProcessAlive(this.process)) {
      this.terminate();
    }
  }

  /**
   * Resolves once the current process (if any) has exited and its output
   * has been drained
   */
  waitForExit(): Promise<void> {
    return this.exited;
  }

  log(message: string): void {
    appendBounded(this.logLines, formatLogEntry(message), this.settings.maxLogLines ?? 0);
  }

  tail(maxLines: number): string[] {
    return maxLines > 0 ? this.logLines.slice(-maxLines) : [...this.logLines];
  }

  summary(): TaskSummary {
    const url = this.config.url;
    return {
      id: this.id,
      url,
      displayUrl: url.length > DISPLAY_URL_LENGTH ? `${url.slice(0, DISPLAY_URL_LENGTH)}...` : url,
      status: this.status,
      progress: this.progress,
    };
  }

  snapshot(): TaskDetails {
    return {
      ...this.summary(),
      config: cloneConfig(this.config),
      savePath: resolveSavePath(this.config),
      gid: this.gid,
      downloadedBytes: this.downloadedBytes,
      totalBytes: this.totalBytes,
      speed: this.speed,
      eta: this.eta,
      connections: this.connections,
      pid: this.process?.pid ?? null,
      spawnCount: this.spawnCount,
      createdAt: this.createdAt.toISOString(),
      startedAt: this.startedAt?.toISOString() ?? null,
      finishedAt: this.finishedAt?.toISOString() ?? null,
    };
  }

  private attach(proc: SupervisedProcess): void {
    this.process = proc;
    const reader = createLineReader(proc);

    reader.on('line', (line) => this.handleOutput(line));

    this.exited = new Promise<void>((resolve) => {
      let settled = false;
      let streamClosed = false;
      let exit: { code: number | null; signal: NodeJS.Signals | null } | null = null;

      const tryFinish = () => {
        const result = exit;
        if (settled || !streamClosed || !result) return;
        settled = true;
        this.finish(proc, result.code, result.signal);
        resolve();
      };

      reader.once('close', () => {
        streamClosed = true;
        tryFinish();
      });

      proc.on('close', (code, signal) => {
        exit = { code, signal };
        tryFinish();
      });

      proc.on('error', (error) => {
        if (settled) return;
        if (proc.pid !== undefined) {
          // Spawned fine, e.g. a failed kill(); the close event still follows
          this.log(`Process error: ${error.message}`);
          return;
        }
        settled = true;
        reader.close();
        this.detach(proc);
        this.fail(`Failed to start: ${error.message}`);
        resolve();
      });
    });
  }

  private detach(proc: SupervisedProcess): void {
    this.clearKillTimer();
    if (this.process === proc) {
      this.process = null;
    }
  }

  private handleOutput(chunk: string): void {
    // aria2c redraws its readout with \r when it thinks it has a terminal
    for (const line of chunk.split('\r')) {
      if (this.stopRequested) return;
      if (!line.trim()) continue;

      this.log(line);
      if (this.settings.debug) {
        console.log(`[Task #${this.id}] ${line}`);
      }

      try {
        const update = parseProgressLine(line);
        if (update) {
          this.applyProgress(update);
        }
      } catch (error) {
        this.log(`Failed to parse progress: ${errorMessage(error)}`);
      }

      if (isCompletionLine(line)) {
        this.status = 'completed';
      }
    }
  }

  private applyProgress(update: ProgressUpdate): void {
    this.gid = update.gid;
    this.downloadedBytes = update.downloadedBytes;
    this.totalBytes = update.totalBytes;
    this.progress = update.progress;
    this.connections = update.connections;
    this.speed = update.speed;
    this.eta = update.eta;
  }

  private finish(proc: SupervisedProcess, code: number | null, signal: NodeJS.Signals | null): void {
    this.detach(proc);
    this.finishedAt = new Date();

    if (this.stopRequested) {
      // pause() or stop() already set the status
      this.log(`Process exited (${describeExit(code, signal)})`);
      return;
    }

    if (code === 0) {
      this.status = 'completed';
      this.progress = 100;
      this.log('Download completed');
      console.log(`[Task #${this.id}] Completed: ${this.config.url} (${formatBytes(this.totalBytes)})`);
    } else {
      this.status = 'error';
      this.log(`Download error, return code: ${code ?? signal ?? 'unknown'}`);
      console.error(`[Task #${this.id}] Download failed (${describeExit(code, signal)})`);
    }
  }

  private reject(message: string): LifecycleResult {
    this.log(message);
    return { success: false, message };
  }

  private fail(message: string): LifecycleResult {
    this.log(message);
    this.status = 'error';
    this.finishedAt = new Date();
    console.error(`[Task #${this.id}] ${message}`);
    return { success: false, message };
  }

  private terminate(): void {
    const proc = this.process;
    if (!proc) return;

    this.stopRequested = true;
    proc.kill('SIGTERM');

    const gracePeriod = this.settings.killGracePeriodMs ?? 0;
    if (gracePeriod > 0) {
      this.clearKillTimer();
      this.killTimer = setTimeout(() => {
        this.killTimer = null;
        if (isProcessAlive(proc)) {
          this.log(`Process did not exit after ${gracePeriod}ms, sending SIGKILL`);
          proc.kill('SIGKILL');
        }
      }, gracePeriod);
      this.killTimer.unref();
    }
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
  }
}
