import type { FieldKind, FieldSpec, LogRecord } from "../../interfaces/index.js";

import { REQUEST_FIELD, REQUEST_TIME_FIELD } from "./fieldSpec.js";

const MATCHERS: Record<FieldKind, RegExp> = {
  quoted: /"[^"]+"/y,
  bracketed: /\[[^\]]+\]/y,
  plain: /\S+/y,
};

const SEPARATOR = /\s+/y;

const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function matchAt(pattern: RegExp, line: string, position: number): string | undefined {
  pattern.lastIndex = position;
  const match = pattern.exec(line);
  return match ? match[0] : undefined;
}

function parseSeconds(value: string): number | undefined {
  if (!DECIMAL_NUMBER.test(value)) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Decodes one access log line positionally. Returns `undefined` when any field fails
 * to match at the cursor; malformed lines are expected and never throw.
 */
export function parseLine(line: string, fieldSpec: FieldSpec): LogRecord | undefined {
  const fields: Record<string, string> = {};
  let url: string | undefined;
  let requestTime: number | undefined;
  let cursor = 0;

  for (let index = 0; index < fieldSpec.length; index++) {
    const field = fieldSpec[index];
    const value = matchAt(MATCHERS[field.kind], line, cursor);
    if (value === undefined) return undefined;
    cursor += value.length;

    if (field.name === REQUEST_TIME_FIELD) {
      requestTime = parseSeconds(value);
      if (requestTime === undefined) return undefined;
    } else {
      if (field.name === REQUEST_FIELD) {
        const parts = value.split(/\s+/).filter((part) => part.length > 0);
        if (parts.length < 2) return undefined;
        url = parts[1];
      }
      fields[field.name] = value;
    }

    if (index < fieldSpec.length - 1) {
      const separator = matchAt(SEPARATOR, line, cursor);
      if (separator === undefined) return undefined;
      cursor += separator.length;
    }
  }

  if (url === undefined || requestTime === undefined) return undefined;
  return { ...fields, url, request_time: requestTime };
}
