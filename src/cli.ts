#!/usr/bin/env node
import {
  type AccessReportOptions,
  resolveAccessReportOptions,
  resolveConfigFilePath,
} from "./application/config/resolveAccessReportOptions.js";
import { AccessReportService } from "./application/services/AccessReportService.js";

import { type Logger, asLogLevel, createLogger } from "./infrastructure/logging/Logger.js";

type ParsedArgs = {
  _: string[];
  [key: string]: string | undefined | string[];
};

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { _: [] };

  for (let i = 0; i < argv.length; i++) {
    const current = argv[i];
    if (!current.startsWith("--")) {
      parsed._.push(current);
      continue;
    }

    const key = current.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith("--")) {
      parsed[key] = "true";
      continue;
    }

    parsed[key] = next;
    i++;
  }

  return parsed;
}

function getOptionalArg(args: ParsedArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function getOptionalNumberArg(args: ParsedArgs, key: string): number | undefined {
  const value = args[key];
  if (typeof value !== "string") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) return undefined;
  return parsed;
}

function printHelp(): void {
  process.stdout.write(
    [
      "access-log-report",
      "",
      "Commands:",
      "  report  Build the HTML report for the newest nginx-access-ui log (default)",
      "  help    Show this message",
      "",
      "Flags:",
      "  --config        JSON configuration file path (default: ./access-log-report.config.json when present)",
      "  --log-dir       Directory with nginx-access-ui.log-YYYYMMDD[.gz] files (default: ./log)",
      "  --report-dir    Directory for report-YYYY.MM.DD.html files (default: ./reports)",
      "  --report-size   Number of slowest URLs in the report (default: 1000)",
      "  --errors-limit  Highest tolerated share of unparsable lines, 0..1 (default: 0.05)",
      "  --template      HTML template containing $table_json (default: bundled templates/report.html)",
      "  --log-file      Append diagnostics to this file instead of stdout (optional)",
      "  --log-level     DEBUG|INFO|WARN|ERROR (default: INFO)",
      "",
    ].join("\n"),
  );
}

function resolveOptions(args: ParsedArgs): AccessReportOptions {
  const reportSize = getOptionalNumberArg(args, "report-size");
  const overrides: Partial<AccessReportOptions> = {
    errorsLimit: getOptionalNumberArg(args, "errors-limit"),
    logDir: getOptionalArg(args, "log-dir"),
    logFile: getOptionalArg(args, "log-file"),
    logLevel: asLogLevel(getOptionalArg(args, "log-level")),
    reportDir: getOptionalArg(args, "report-dir"),
    reportSize: reportSize === undefined ? undefined : Math.trunc(reportSize),
    templatePath: getOptionalArg(args, "template"),
  };

  return resolveAccessReportOptions({
    configFilePath: resolveConfigFilePath(process.argv.slice(2), process.env),
    env: process.env,
    overrides,
  });
}

async function runReport(options: AccessReportOptions, logger: Logger): Promise<void> {
  const service = new AccessReportService(options, logger);
  await service.run();
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args._[0] ?? "report";

  if (command === "help" || command === "--help" || command === "-h" || args.help) {
    printHelp();
    return;
  }

  if (command !== "report") {
    printHelp();
    process.exitCode = 1;
    return;
  }

  const options = resolveOptions(args);
  const logger = createLogger({ filePath: options.logFile, level: options.logLevel });

  try {
    await runReport(options, logger);
  } catch (error) {
    logger.exception(error, "Report run failed");
    process.exitCode = 1;
  }
}

main().catch((error) => {
  process.stderr.write(
    `[access-log-report] fatal: ${error instanceof Error ? error.stack || error.message : String(error)}\n`,
  );
  process.exit(1);
});
