import { access } from "node:fs/promises";
import { join } from "node:path";

import type { FieldSpec, ReportRunResult, UrlStat } from "../../interfaces/index.js";

import type { Logger } from "../../infrastructure/logging/Logger.js";
import { compileFieldSpec } from "../../infrastructure/parsing/fieldSpec.js";
import { createLogParseReport, parseLogFile } from "../../infrastructure/parsing/parseLogFile.js";
import {
  formatCalendarDate,
  selectLatestLogFile,
} from "../../infrastructure/selection/selectLatestLogFile.js";
import { NoRecordsError, aggregateUrlStats } from "../../usecases/aggregateUrlStats.js";
import {
  readReportTemplate,
  renderReport,
  resolveReportPath,
  writeReportFile,
} from "../../usecases/renderReport.js";
import { selectTopUrlStats } from "../../usecases/selectTopUrlStats.js";

import type { AccessReportOptions } from "../config/resolveAccessReportOptions.js";

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class AccessReportService {
  private readonly fieldSpec: FieldSpec;

  constructor(
    private readonly options: AccessReportOptions,
    private readonly logger: Logger,
  ) {
    this.fieldSpec = compileFieldSpec(options.logFormat);
  }

  /**
   * Builds the report for the newest rotated log. Budget, template and I/O failures
   * reject; nothing is written under the report name in that case.
   */
  async run(): Promise<ReportRunResult> {
    const { errorsLimit, logDir, reportDir, reportSize, templatePath } = this.options;

    const logFile = await selectLatestLogFile(logDir);
    if (!logFile) {
      this.logger.error(`Can't find log files in ${logDir}.`);
      return { status: "no-input", logDir };
    }

    const reportPath = resolveReportPath(reportDir, logFile.date);
    if (await fileExists(reportPath)) {
      this.logger.info(`Report ${reportPath} already exists.`);
      return { status: "exists", logFile, reportPath };
    }

    const template = await readReportTemplate(templatePath);
    const logPath = join(logDir, logFile.name);
    const parse = createLogParseReport(logPath);

    this.logger.info(`Start parsing ${logFile.name} (${formatCalendarDate(logFile.date, "-")}).`);

    let stats: UrlStat[];
    try {
      stats = await aggregateUrlStats(
        parseLogFile(logPath, this.fieldSpec, { errorsLimit, logger: this.logger, report: parse }),
      );
    } catch (error) {
      if (!(error instanceof NoRecordsError)) throw error;
      this.logger.error(`No parsable records in ${logFile.name} (${parse.linesScanned} lines).`);
      return { status: "no-records", logFile };
    }

    this.logger.info(
      `Parsed ${parse.recordsParsed} of ${parse.linesScanned} lines, ` +
        `${parse.parseErrors} errors, ${stats.length} urls.`,
    );

    const top = selectTopUrlStats(stats, reportSize);
    await writeReportFile(reportPath, renderReport(template, top));
    this.logger.info(`Report written to ${reportPath}.`);

    return { status: "written", logFile, parse, reportPath, urlCount: stats.length };
  }
}
