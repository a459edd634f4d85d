import { fileURLToPath } from "node:url";
import { MikroConf } from "mikroconf";

import { type LogLevel, asLogLevel } from "../../infrastructure/logging/Logger.js";
import { DEFAULT_LOG_FORMAT } from "../../infrastructure/parsing/fieldSpec.js";

export type AccessReportOptions = {
  errorsLimit: number;
  logDir: string;
  logFile?: string;
  logFormat: string;
  logLevel: LogLevel;
  reportDir: string;
  reportSize: number;
  templatePath: string;
};

export type ResolveAccessReportOptionsInput = {
  configFilePath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<AccessReportOptions>;
};

export const DEFAULT_ACCESS_REPORT_CONFIG_FILE_PATH = "access-log-report.config.json";

export const DEFAULT_REPORT_TEMPLATE_PATH = fileURLToPath(
  new URL("../../../templates/report.html", import.meta.url),
);

const DEFAULT_OPTIONS: Omit<AccessReportOptions, "logFile"> = {
  errorsLimit: 0.05,
  logDir: "./log",
  logFormat: DEFAULT_LOG_FORMAT,
  logLevel: "INFO",
  reportDir: "./reports",
  reportSize: 1000,
  templatePath: DEFAULT_REPORT_TEMPLATE_PATH,
};

function asTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function asInteger(value: unknown): number | undefined {
  const parsed = asNumber(value);
  if (parsed === undefined) return undefined;
  return Math.trunc(parsed);
}

function asRatio(value: unknown): number | undefined {
  const parsed = asNumber(value);
  if (parsed === undefined || parsed < 0 || parsed > 1) return undefined;
  return parsed;
}

function normalizeOptionalStringFields(
  value: Partial<AccessReportOptions>,
): Partial<AccessReportOptions> {
  return {
    ...value,
    logDir: asTrimmedString(value.logDir),
    logFile: asTrimmedString(value.logFile),
    logFormat: asTrimmedString(value.logFormat),
    reportDir: asTrimmedString(value.reportDir),
    templatePath: asTrimmedString(value.templatePath),
  };
}

function normalizeCriticalFields(value: Record<string, unknown>): AccessReportOptions {
  const reportSize = asInteger(value.reportSize);

  return {
    errorsLimit: asRatio(value.errorsLimit) ?? DEFAULT_OPTIONS.errorsLimit,
    logDir: asTrimmedString(value.logDir) ?? DEFAULT_OPTIONS.logDir,
    logFile: asTrimmedString(value.logFile),
    logFormat: asTrimmedString(value.logFormat) ?? DEFAULT_OPTIONS.logFormat,
    logLevel: asLogLevel(value.logLevel) ?? DEFAULT_OPTIONS.logLevel,
    reportDir: asTrimmedString(value.reportDir) ?? DEFAULT_OPTIONS.reportDir,
    reportSize: reportSize && reportSize > 0 ? reportSize : DEFAULT_OPTIONS.reportSize,
    templatePath: asTrimmedString(value.templatePath) ?? DEFAULT_OPTIONS.templatePath,
  };
}

function readEnvOptions(env: NodeJS.ProcessEnv): Partial<AccessReportOptions> {
  return normalizeOptionalStringFields({
    errorsLimit: asNumber(env.ACCESS_REPORT_ERRORS_LIMIT),
    logDir: env.ACCESS_REPORT_LOG_DIR,
    logFile: env.ACCESS_REPORT_LOG_FILE,
    logFormat: env.ACCESS_REPORT_LOG_FORMAT,
    logLevel: asLogLevel(env.ACCESS_REPORT_LOG_LEVEL),
    reportDir: env.ACCESS_REPORT_REPORT_DIR,
    reportSize: asInteger(env.ACCESS_REPORT_REPORT_SIZE),
    templatePath: env.ACCESS_REPORT_TEMPLATE_PATH,
  });
}

function withoutUndefined(value: Partial<AccessReportOptions>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

function defaultsAsConfigOptions() {
  return Object.entries(DEFAULT_OPTIONS).map(([path, defaultValue]) => ({
    defaultValue,
    path,
  }));
}

export function resolveConfigFilePath(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): string {
  for (let index = 0; index < args.length; index++) {
    if (args[index] !== "--config") continue;
    const candidate = args[index + 1];
    if (candidate && !candidate.startsWith("-")) {
      return candidate;
    }
  }

  return asTrimmedString(env.ACCESS_REPORT_CONFIG_PATH) ?? DEFAULT_ACCESS_REPORT_CONFIG_FILE_PATH;
}

/**
 * Layers defaults, the JSON config file, `ACCESS_REPORT_*` environment variables and
 * direct overrides, in increasing precedence.
 */
export function resolveAccessReportOptions(
  input: ResolveAccessReportOptionsInput = {},
): AccessReportOptions {
  const env = input.env ?? process.env;
  const configFilePath =
    input.configFilePath ??
    asTrimmedString(env.ACCESS_REPORT_CONFIG_PATH) ??
    DEFAULT_ACCESS_REPORT_CONFIG_FILE_PATH;
  const envOptions = withoutUndefined(readEnvOptions(env));
  const overrides = withoutUndefined(normalizeOptionalStringFields(input.overrides || {}));

  const config = new MikroConf({
    config: {
      ...envOptions,
      ...overrides,
    },
    configFilePath,
    options: defaultsAsConfigOptions(),
  });

  return normalizeCriticalFields(config.get<Record<string, unknown>>());
}
