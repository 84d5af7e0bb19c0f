/**
 * Date formatting utilities for OSS request signing
 */

/**
 * Format date as an RFC 1123 GMT timestamp, e.g. `Mon, 01 Jan 2024 00:00:00 GMT`
 */
export function formatHttpDate(date: Date): string {
  return date.toUTCString();
}

/**
 * Whole seconds since the Unix epoch
 */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
