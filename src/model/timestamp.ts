/**
 * Timestamp helpers for record metadata.
 */

/**
 * Source of the current time. Injected so tests can pin it.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
