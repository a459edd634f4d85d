import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  exception: (error: unknown, message?: string) => void;
};

export type CreateLoggerOptions = {
  level?: LogLevel;
  filePath?: string;
  now?: () => Date;
  write?: (line: string) => void;
};

export function asLogLevel(value: unknown): LogLevel | undefined {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().toUpperCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}.${pad(date.getMonth() + 1)}.${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function createSink(filePath: string | undefined): (line: string) => void {
  if (!filePath) return (line) => process.stdout.write(line);

  mkdirSync(dirname(filePath), { recursive: true });
  return (line) => appendFileSync(filePath, line, "utf8");
}

/**
 * Writes `[YYYY.MM.DD HH:MM:SS] L message` lines to stdout, or appends them to
 * `filePath`. Messages below `level` are dropped.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "INFO");
  const now = options.now ?? (() => new Date());
  const write = options.write ?? createSink(options.filePath);

  const log = (level: LogLevel, message: string) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    write(`[${formatLogTimestamp(now())}] ${level[0]} ${message}\n`);
  };

  return {
    debug: (message) => log("DEBUG", message),
    info: (message) => log("INFO", message),
    warn: (message) => log("WARN", message),
    error: (message) => log("ERROR", message),
    exception: (error, message) => {
      const detail = error instanceof Error ? error.stack || error.message : String(error);
      log("ERROR", message ? `${message}: ${detail}` : detail);
    },
  };
}

export const silentLogger: Logger = createLogger({ write: () => undefined });
