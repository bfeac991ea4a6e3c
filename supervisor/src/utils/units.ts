const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 * 1024,
  G: 1024 * 1024 * 1024,
  T: 1024 * 1024 * 1024 * 1024,
};

// Leading number, optional K/M/G/T, optional "iB"/"B" tail
const SIZE_PATTERN = /^\s*(\d+(?:\.\d*)?|\.\d+)\s*([KMGT])?(?:i?B)?/i;

/**
 * Parse size string like "10.5MiB", "512KB", "934" to bytes.
 * Returns 0 for empty or unparsable input.
 */
export function toBytes(sizeStr: string): number {
  if (!sizeStr) return 0;

  const match = sizeStr.match(SIZE_PATTERN);
  if (!match) return 0;

  const value = parseFloat(match[1]);
  const unit = (match[2] || '').toUpperCase();
  const bytes = Math.trunc(value * UNIT_MULTIPLIERS[unit]);

  return Number.isFinite(bytes) ? bytes : 0;
}

/**
 * Format bytes for log output, e.g. 1536 -> "1.5 KB"
 */
export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
