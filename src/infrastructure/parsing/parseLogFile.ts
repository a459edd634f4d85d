import { createReadStream } from "node:fs";
import readline from "node:readline";
import type { Readable } from "node:stream";
import { createGunzip } from "node:zlib";

import type { FieldSpec, LogParseReport, LogRecord } from "../../interfaces/index.js";

import type { Logger } from "../logging/Logger.js";
import { parseLine } from "./parseLine.js";

export type ParseLogFileOptions = {
  /** Highest tolerated share of unparsable lines, as a fraction of all lines. */
  errorsLimit?: number;
  logger?: Logger;
  /** Counters updated while the file is read; a fresh report is used when omitted. */
  report?: LogParseReport;
};

export class ErrorsBudgetExceededError extends Error {
  readonly parseErrors: number;
  readonly linesScanned: number;
  readonly errorsLimit: number;

  constructor(parseErrors: number, linesScanned: number, errorsLimit: number) {
    super(
      `Errors limit exceeded: ${parseErrors} of ${linesScanned} lines failed to parse ` +
        `(ratio ${(parseErrors / linesScanned).toFixed(4)}, limit ${errorsLimit}).`,
    );
    this.name = "ErrorsBudgetExceededError";
    this.parseErrors = parseErrors;
    this.linesScanned = linesScanned;
    this.errorsLimit = errorsLimit;
  }

  get ratio(): number {
    return this.parseErrors / this.linesScanned;
  }
}

export function createLogParseReport(filePath: string): LogParseReport {
  return {
    filePath,
    linesScanned: 0,
    recordsParsed: 0,
    parseErrors: 0,
  };
}

function openLines(filePath: string): { input: Readable; streams: Readable[] } {
  const source = createReadStream(filePath);
  if (!filePath.endsWith(".gz")) return { input: source, streams: [source] };

  const gunzip = createGunzip();
  source.once("error", (error) => gunzip.destroy(error));
  return { input: source.pipe(gunzip), streams: [source, gunzip] };
}

/**
 * Streams parsed records out of a plain or gzip-compressed access log. Unparsable
 * lines are skipped and counted; once the file is exhausted the error ratio is
 * checked against `errorsLimit`, so the failure surfaces only after the last record.
 */
export async function* parseLogFile(
  filePath: string,
  fieldSpec: FieldSpec,
  options: ParseLogFileOptions = {},
): AsyncGenerator<LogRecord, LogParseReport, undefined> {
  const { input, streams } = openLines(filePath);
  input.setEncoding("utf8");
  const reader = readline.createInterface({ input, crlfDelay: Infinity });

  const report = options.report ?? createLogParseReport(filePath);

  try {
    for await (const line of reader) {
      report.linesScanned++;
      const record = parseLine(line, fieldSpec);
      if (!record) {
        report.parseErrors++;
        options.logger?.debug(`Can't parse line ${report.linesScanned}: ${line}`);
        continue;
      }

      report.recordsParsed++;
      yield record;
    }
  } finally {
    reader.close();
    for (const stream of streams) stream.destroy();
  }

  const { errorsLimit } = options;
  if (
    errorsLimit !== undefined &&
    report.linesScanned > 0 &&
    report.parseErrors / report.linesScanned > errorsLimit
  ) {
    throw new ErrorsBudgetExceededError(report.parseErrors, report.linesScanned, errorsLimit);
  }

  return report;
}
