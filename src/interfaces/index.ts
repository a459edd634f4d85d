export type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

export type LogFileDescriptor = {
  name: string;
  date: CalendarDate;
};

export type FieldKind = "quoted" | "bracketed" | "plain";

export type FieldDescriptor = {
  readonly kind: FieldKind;
  readonly name: string;
};

export type FieldSpec = readonly FieldDescriptor[];

/**
 * One parsed access log line. Values keep their delimiters, except `request_time`
 * (seconds) and the derived `url` (request path).
 */
export type LogRecord = {
  [field: string]: string | number;
  url: string;
  request_time: number;
};

export type UrlStat = {
  url: string;
  count: number;
  count_perc: number;
  time_sum: number;
  time_perc: number;
  time_avg: number;
  time_max: number;
  time_med: number;
};

export type LogParseReport = {
  filePath: string;
  linesScanned: number;
  recordsParsed: number;
  parseErrors: number;
};

export type ReportRunResult =
  | { status: "no-input"; logDir: string }
  | { status: "exists"; logFile: LogFileDescriptor; reportPath: string }
  | { status: "no-records"; logFile: LogFileDescriptor }
  | {
      status: "written";
      logFile: LogFileDescriptor;
      parse: LogParseReport;
      reportPath: string;
      urlCount: number;
    };
