import { toBytes } from './units.js';
import { ProgressParseError } from './errors.js';
import type { ProgressUpdate } from '../types/task.js';

// aria2c console readout, e.g.
// [#2089b0 400KiB/33MiB(1%) CN:4 DL:115KiB ETA:4m51s]
const PROGRESS_PATTERN =
  /\[#(?<gid>[0-9a-f]+)\s+(?<have>[0-9.\w]+)\/(?<total>[0-9.\w]+)\((?<percent>[0-9]+)%\)\s+CN:(?<connections>[0-9]+)\s+DL:(?<speed>[0-9.\w]+)\s+ETA:(?<eta>[^\]]+)\]/i;

const COMPLETION_PHRASES = ['download complete', 'completed', 'download finished'];

function toInteger(value: string, field: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new ProgressParseError(`invalid ${field}: ${value}`);
  }
  return parsed;
}

/**
 * Extract a progress update from one line of aria2c output.
 * Returns null when the line carries no progress marker.
 */
export function parseProgressLine(line: string): ProgressUpdate | null {
  const groups = PROGRESS_PATTERN.exec(line)?.groups;
  if (!groups) return null;

  return {
    gid: groups.gid,
    downloadedBytes: toBytes(groups.have),
    totalBytes: toBytes(groups.total),
    progress: toInteger(groups.percent, 'percentage'),
    connections: toInteger(groups.connections, 'connection count'),
    speed: groups.speed,
    eta: groups.eta.trim(),
  };
}

/**
 * Completion phrasing that aria2c prints outside of the progress marker,
 * e.g. "(OK):download completed."
 */
export function isCompletionLine(line: string): boolean {
  const lower = line.toLowerCase();
  return COMPLETION_PHRASES.some(phrase => lower.includes(phrase));
}
