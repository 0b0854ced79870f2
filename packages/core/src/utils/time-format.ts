const pad = (n: number): string => n.toString().padStart(2, '0');

/**
 * Formats a date as YYYY-MM-DD HH:mm:ss in local time.
 */
export function formatLocalTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
         `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Formats a date as YYYYMMDD_HHmmss in local time, for use in file names.
 */
export function formatFileTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
         `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Formats an elapsed time as "12.3s (0m 12s)".
 */
export function formatDuration(startTime: Date, endTime: Date): string {
  const elapsedMs = Math.max(0, endTime.getTime() - startTime.getTime());
  const wholeSeconds = Math.floor(elapsedMs / 1000);
  return `${(elapsedMs / 1000).toFixed(1)}s (${Math.floor(wholeSeconds / 60)}m ${wholeSeconds % 60}s)`;
}
