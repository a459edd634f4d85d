import type { FieldDescriptor, FieldKind, FieldSpec } from "../../interfaces/index.js";

export const DEFAULT_LOG_FORMAT =
  'remote_addr remote_user http_x_real_ip [time_local] "request" status body_bytes_sent ' +
  '"http_referer" "http_user_agent" "http_x_forwarded_for" "http_X_REQUEST_ID" "http_X_RB_USER" ' +
  "request_time";

export const REQUEST_FIELD = "request";
export const REQUEST_TIME_FIELD = "request_time";

export class FieldSpecError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FieldSpecError";
  }
}

function kindOf(token: string): FieldKind {
  if (token.startsWith('"') && token.endsWith('"')) return "quoted";
  if (token.startsWith("[") && token.endsWith("]")) return "bracketed";
  return "plain";
}

/**
 * Compiles a whitespace-separated format template into field descriptors. Quotes or
 * brackets around a token select how its value is matched; the bare token is the
 * field name.
 */
export function compileFieldSpec(template: string): FieldSpec {
  const tokens = template.split(/\s+/).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    throw new FieldSpecError("Log format template has no fields.");
  }

  const fields: FieldDescriptor[] = tokens.map((token) => {
    const name = token.replace(/^["[\]]+|["[\]]+$/g, "");
    if (name.length === 0) {
      throw new FieldSpecError(`Log format token "${token}" has no field name.`);
    }
    return { kind: kindOf(token), name };
  });

  for (const required of [REQUEST_FIELD, REQUEST_TIME_FIELD]) {
    if (!fields.some((field) => field.name === required)) {
      throw new FieldSpecError(`Log format template must include the "${required}" field.`);
    }
  }

  return Object.freeze(fields.map((field) => Object.freeze(field)));
}

export const DEFAULT_FIELD_SPEC: FieldSpec = compileFieldSpec(DEFAULT_LOG_FORMAT);
