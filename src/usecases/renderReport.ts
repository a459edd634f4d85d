import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { CalendarDate, UrlStat } from "../interfaces/index.js";

import { formatCalendarDate } from "../infrastructure/selection/selectLatestLogFile.js";

const TABLE_JSON_PLACEHOLDER = /\$(?:table_json\b|\{table_json\})/g;

const REPORT_FIELDS = [
  "url",
  "count",
  "count_perc",
  "time_sum",
  "time_perc",
  "time_avg",
  "time_max",
  "time_med",
] as const satisfies readonly (keyof UrlStat)[];

export function serializeUrlStats(stats: readonly UrlStat[]): string {
  const rows = stats.map((stat) =>
    Object.fromEntries(REPORT_FIELDS.map((field) => [field, stat[field]])),
  );
  return JSON.stringify(rows).replace(/</g, "\\u003c");
}

/** Substitutes `$table_json` in the template; other `$` sequences stay as they are. */
export function renderReport(template: string, stats: readonly UrlStat[]): string {
  const tableJson = serializeUrlStats(stats);
  return template.replace(TABLE_JSON_PLACEHOLDER, () => tableJson);
}

export function resolveReportPath(reportDir: string, date: CalendarDate): string {
  return join(reportDir, `report-${formatCalendarDate(date, ".")}.html`);
}

export async function readReportTemplate(templatePath: string): Promise<string> {
  try {
    return await readFile(templatePath, "utf8");
  } catch (error) {
    throw new Error(
      `Failed to read report template at ${templatePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/** Writes beside the target and renames, so a half-written report never carries the final name. */
export async function writeReportFile(reportPath: string, html: string): Promise<void> {
  await mkdir(dirname(reportPath), { recursive: true });
  const temporaryPath = `${reportPath}.tmp`;
  try {
    await writeFile(temporaryPath, html, "utf8");
    await rename(temporaryPath, reportPath);
  } catch (error) {
    await rm(temporaryPath, { force: true });
    throw error;
  }
}
