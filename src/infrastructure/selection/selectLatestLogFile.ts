import { readdir, stat } from "node:fs/promises";

import type { CalendarDate, LogFileDescriptor } from "../../interfaces/index.js";

const LOG_FILE_NAME_PATTERN = /^nginx-access-ui\.log-(\d{4})(\d{2})(\d{2})(\.gz)?$/;

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    codes.includes(error.code)
  );
}

function toCalendarDate(year: number, month: number, day: number): CalendarDate | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return undefined;
  }
  return { year, month, day };
}

function dateKey(date: CalendarDate): number {
  return date.year * 10_000 + date.month * 100 + date.day;
}

export function compareCalendarDates(left: CalendarDate, right: CalendarDate): number {
  return dateKey(left) - dateKey(right);
}

export function formatCalendarDate(date: CalendarDate, separator = ""): string {
  return [
    String(date.year).padStart(4, "0"),
    String(date.month).padStart(2, "0"),
    String(date.day).padStart(2, "0"),
  ].join(separator);
}

export function parseLogFileName(name: string): LogFileDescriptor | undefined {
  const match = LOG_FILE_NAME_PATTERN.exec(name);
  if (!match) return undefined;

  const date = toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  if (!date) return undefined;

  return { name, date };
}

/**
 * Finds the rotated log with the latest embedded date. Entries are visited in name
 * order and only a strictly later date replaces the current pick, so for equal dates
 * the smallest name wins.
 */
export async function selectLatestLogFile(
  directory: string,
): Promise<LogFileDescriptor | undefined> {
  try {
    const info = await stat(directory);
    if (!info.isDirectory()) return undefined;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT", "ENOTDIR")) return undefined;
    throw error;
  }

  const names = await readdir(directory);
  names.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

  let latest: LogFileDescriptor | undefined;
  for (const name of names) {
    const candidate = parseLogFileName(name);
    if (!candidate) continue;
    if (!latest || compareCalendarDates(candidate.date, latest.date) > 0) {
      latest = candidate;
    }
  }

  return latest;
}
