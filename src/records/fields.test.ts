import { describe, expect, it } from "vitest";
import { firstPresent, readBoolean, readNumber, readString, readTimestamp } from "./fields.js";

const T = Date.UTC(2023, 10, 14, 22, 13, 20); // 1700000000 seconds

describe("readTimestamp", () => {
  it("reads epoch seconds and milliseconds alike", () => {
    expect(readTimestamp(1700000000)).toEqual({ kind: "present", value: new Date(T) });
    expect(readTimestamp(1700000000000)).toEqual({ kind: "present", value: new Date(T) });
    expect(readTimestamp("1700000000")).toEqual({ kind: "present", value: new Date(T) });
  });

  it("reads ISO strings and timestamp objects", () => {
    expect(readTimestamp("2025-01-02T03:04:05Z")).toEqual({
      kind: "present",
      value: new Date(Date.UTC(2025, 0, 2, 3, 4, 5)),
    });
    expect(readTimestamp({ seconds: 1700000000, nanoseconds: 500000000 })).toEqual({
      kind: "present",
      value: new Date(T + 500),
    });
    expect(readTimestamp({ _seconds: 1700000000 })).toEqual({ kind: "present", value: new Date(T) });
  });

  it("treats empty values and a zero epoch as missing", () => {
    expect(readTimestamp(undefined)).toEqual({ kind: "missing" });
    expect(readTimestamp(null)).toEqual({ kind: "missing" });
    expect(readTimestamp("  ")).toEqual({ kind: "missing" });
    expect(readTimestamp(0)).toEqual({ kind: "missing" });
  });

  it("flags unparseable values as malformed", () => {
    expect(readTimestamp("yesterday")).toEqual({ kind: "malformed", raw: "yesterday" });
    expect(readTimestamp(Number.NaN)).toEqual({ kind: "malformed", raw: Number.NaN });
    expect(readTimestamp([1, 2])).toEqual({ kind: "malformed", raw: [1, 2] });
  });
});

describe("scalar readers", () => {
  it("trims strings and accepts numeric identifiers", () => {
    expect(readString({ UID: "  B1 " }, "UID")).toBe("B1");
    expect(readString({ UID: 42 }, "UID")).toBe("42");
    expect(readString({ UID: "" }, "UID")).toBeUndefined();
  });

  it("parses numbers and numeric strings only", () => {
    expect(readNumber("12.5")).toBe(12.5);
    expect(readNumber(3)).toBe(3);
    expect(readNumber("3h")).toBeUndefined();
  });

  it("keeps booleans strict", () => {
    expect(readBoolean(true)).toEqual({ kind: "present", value: true });
    expect(readBoolean(undefined)).toEqual({ kind: "missing" });
    expect(readBoolean("true")).toEqual({ kind: "malformed", raw: "true" });
  });

  it("prefers the first present value, then the first malformed one", () => {
    expect(firstPresent(readTimestamp(undefined), readTimestamp(1700000000))).toEqual({
      kind: "present",
      value: new Date(T),
    });
    expect(firstPresent(readTimestamp(undefined), readTimestamp("bad"))).toEqual({ kind: "malformed", raw: "bad" });
    expect(firstPresent(readTimestamp(undefined), readTimestamp(null))).toEqual({ kind: "missing" });
  });
});
