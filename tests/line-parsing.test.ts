import { describe, expect, it } from "vitest";

import {
  DEFAULT_FIELD_SPEC,
  FieldSpecError,
  compileFieldSpec,
} from "../src/infrastructure/parsing/fieldSpec.js";
import { parseLine } from "../src/infrastructure/parsing/parseLine.js";

const WELL_FORMED_LINE =
  '10.0.3.17 4a1c9e2b7d  - [18/Mar/2024:11:04:09 +0300] "GET /api/v2/banner/25019354 HTTP/1.1" ' +
  '200 927 "-" "Mozilla/5.0 (Windows NT 6.1)" "-" "1710749049-2190034393-4708-9752759" "dc7161be3" 0.390';

describe("Field spec compilation", () => {
  it("compiles the default nginx format into typed descriptors", () => {
    expect(DEFAULT_FIELD_SPEC.length).toBe(13);
    expect(DEFAULT_FIELD_SPEC[0]).toEqual({ kind: "plain", name: "remote_addr" });
    expect(DEFAULT_FIELD_SPEC[3]).toEqual({ kind: "bracketed", name: "time_local" });
    expect(DEFAULT_FIELD_SPEC[4]).toEqual({ kind: "quoted", name: "request" });
    expect(DEFAULT_FIELD_SPEC[12]).toEqual({ kind: "plain", name: "request_time" });
  });

  it("rejects templates without fields, names, or the request fields", () => {
    expect(() => compileFieldSpec("   ")).toThrow(FieldSpecError);
    expect(() => compileFieldSpec('"request" "" request_time')).toThrow(FieldSpecError);
    expect(() => compileFieldSpec("remote_addr request_time")).toThrow(
      'Log format template must include the "request" field.',
    );
    expect(() => compileFieldSpec('"request" status')).toThrow(
      'Log format template must include the "request_time" field.',
    );
  });
});

describe("Line parsing", () => {
  it("decodes every field of a well-formed line", () => {
    expect(parseLine(WELL_FORMED_LINE, DEFAULT_FIELD_SPEC)).toEqual({
      remote_addr: "10.0.3.17",
      remote_user: "4a1c9e2b7d",
      http_x_real_ip: "-",
      time_local: "[18/Mar/2024:11:04:09 +0300]",
      request: '"GET /api/v2/banner/25019354 HTTP/1.1"',
      url: "/api/v2/banner/25019354",
      status: "200",
      body_bytes_sent: "927",
      http_referer: '"-"',
      http_user_agent: '"Mozilla/5.0 (Windows NT 6.1)"',
      http_x_forwarded_for: '"-"',
      http_X_REQUEST_ID: '"1710749049-2190034393-4708-9752759"',
      http_X_RB_USER: '"dc7161be3"',
      request_time: 0.39,
    });
  });

  it("fails on a truncated line instead of returning a partial record", () => {
    const truncated =
      '10.0.3.17 4a1c9e2b7d  - [18/Mar/2024:11:04:0912-4708-9752759" "dc7161be3" 0.390';
    expect(parseLine(truncated, DEFAULT_FIELD_SPEC)).toBeUndefined();

    const missingLastField = WELL_FORMED_LINE.slice(0, WELL_FORMED_LINE.lastIndexOf(" "));
    expect(parseLine(missingLastField, DEFAULT_FIELD_SPEC)).toBeUndefined();
    expect(parseLine(`${missingLastField} `, DEFAULT_FIELD_SPEC)).toBeUndefined();
    expect(parseLine("", DEFAULT_FIELD_SPEC)).toBeUndefined();
  });

  it("fails when the request has no path", () => {
    const line = WELL_FORMED_LINE.replace('"GET /api/v2/banner/25019354 HTTP/1.1"', '"-"');
    expect(parseLine(line, DEFAULT_FIELD_SPEC)).toBeUndefined();
  });

  it("fails when a quoted field is empty", () => {
    const line = WELL_FORMED_LINE.replace('200 927 "-"', '200 927 ""');
    expect(parseLine(line, DEFAULT_FIELD_SPEC)).toBeUndefined();
  });

  it("fails when the request time is not a decimal number", () => {
    for (const value of ["-", "abc", "0x10", "Infinity", "1.2.3"]) {
      const line = WELL_FORMED_LINE.replace(/0\.390$/, value);
      expect(parseLine(line, DEFAULT_FIELD_SPEC)).toBeUndefined();
    }

    const whole = parseLine(WELL_FORMED_LINE.replace(/0\.390$/, "12"), DEFAULT_FIELD_SPEC);
    expect(whole?.request_time).toBe(12);
    const fraction = parseLine(WELL_FORMED_LINE.replace(/0\.390$/, ".5"), DEFAULT_FIELD_SPEC);
    expect(fraction?.request_time).toBe(0.5);
  });

  it("ignores content after the last field", () => {
    const record = parseLine(`${WELL_FORMED_LINE} trailing`, DEFAULT_FIELD_SPEC);
    expect(record?.request_time).toBe(0.39);
    expect(record?.url).toBe("/api/v2/banner/25019354");
  });

  it("keeps the second request token verbatim when the protocol is missing", () => {
    const spec = compileFieldSpec('"request" request_time');
    expect(parseLine('"POST /login" 1.5', spec)).toEqual({
      request: '"POST /login"',
      url: '/login"',
      request_time: 1.5,
    });
  });

  it("parses custom templates", () => {
    const spec = compileFieldSpec('[time_local] "request" request_time');
    expect(parseLine('[01/Jan/2024:00:00:00 +0000]   "HEAD /health HTTP/1.0"\t0.002', spec)).toEqual({
      time_local: "[01/Jan/2024:00:00:00 +0000]",
      request: '"HEAD /health HTTP/1.0"',
      url: "/health",
      request_time: 0.002,
    });
  });
});
