/**
 * Timestamp formatting for signed requests
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as YYYYMMDD (UTC)
 */
export function formatDateStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
}

/**
 * Format date as YYYYMMDDTHHMMSSZ, the value of the X-Date header
 */
export function formatRequestDate(date: Date): string {
  return (
    formatDateStamp(date) +
    `T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`
  );
}
