/** `1h 2m 3s`, `2m 5s` or `45s`. */
export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  if (h > 0) return `${h}h ${m}m ${s}s`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
}

/** Wall-clock time in UTC, `HH:MM:SS`. */
export const formatClock = (date: Date): string => date.toISOString().slice(11, 19);

/** `YYYY-MM-DD HH:MM:SS UTC`. */
export const formatTimestamp = (date: Date): string => `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;

export const formatRetryDelay = (ms: number): string => formatDuration(Math.ceil(ms / 1000));
