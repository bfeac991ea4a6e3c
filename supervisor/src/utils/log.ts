function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogEntry(message: string, date: Date = new Date()): string {
  return `[${formatTimestamp(date)}] ${message}`;
}

/**
 * Append to a log, dropping the oldest entries past maxLines (0 = unbounded)
 */
export function appendBounded(lines: string[], entry: string, maxLines: number): void {
  lines.push(entry);
  if (maxLines > 0 && lines.length > maxLines) {
    lines.splice(0, lines.length - maxLines);
  }
}
