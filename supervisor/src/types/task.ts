export type TaskStatus =
  | 'waiting'     // Created, never started
  | 'downloading' // Child process running
  | 'paused'      // User paused, partial file kept
  | 'stopped'     // User stopped
  | 'completed'   // Child exited 0 or reported completion
  | 'error';      // Spawn failure, directory failure or non-zero exit

export type LifecycleVerb = 'start' | 'pause' | 'resume' | 'stop' | 'delete';

export interface LifecycleResult {
  success: boolean;
  message: string; // Reason when rejected
}

export interface TaskOptions {
  continue: boolean;
  split: number;
  maxConnectionPerServer?: number; // Follows split when unset
  maxTries?: number;
  retryWait?: number;
  maxDownloadLimit?: string;
  maxUploadLimit?: string;
  referer?: string;
  userAgent?: string;
  headers: string[];
  fileAllocation: string;
  extraArgs: string;
}

export interface TaskConfig {
  url: string;
  outputDir: string;
  outputName: string; // Empty = let aria2 pick the name
  options: TaskOptions;
}

export interface TaskConfigInput {
  url: string;
  outputDir?: string;
  outputName?: string;
  options?: Partial<TaskOptions>;
}

export interface ProgressUpdate {
  gid: string;
  downloadedBytes: number;
  totalBytes: number;
  progress: number;    // 0-100
  connections: number;
  speed: string;       // As printed, e.g. "1.5MiB"
  eta: string;
}

export interface TaskSummary {
  id: number;
  url: string;
  displayUrl: string;
  status: TaskStatus;
  progress: number;
}

export interface TaskDetails extends TaskSummary {
  config: TaskConfig;
  savePath: string;
  gid: string | null;
  downloadedBytes: number;
  totalBytes: number;
  speed: string;
  eta: string;
  connections: number;
  pid: number | null;
  spawnCount: number;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}
