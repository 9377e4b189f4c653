/**
 * Scan timestamp formatting
 */

import { UnknownError } from "./errors.js";

/**
 * Format a date as local "d/m/yyyy-h:m:s" without zero padding (e.g. "7/3/2024-9:05:00" is
 * written "7/3/2024-9:5:0")
 * @throws {UnknownError} If the clock returned an invalid date
 */
export function formatScanDate(date: Date): string {
  if (Number.isNaN(date.getTime())) {
    throw new UnknownError("Clock returned an invalid date");
  }

  const day = date.getDate();
  const month = date.getMonth() + 1;
  const year = date.getFullYear();
  return `${day}/${month}/${year}-${date.getHours()}:${date.getMinutes()}:${date.getSeconds()}`;
}

export const systemClock = (): Date => new Date();
