import { describe, expect, it } from "vitest";
import { parseDuration, parseSince } from "../parseSince.js";

const HOUR = 60 * 60 * 1000;

describe("parseDuration", () => {
  it("reads each unit in short and long form", () => {
    expect(parseDuration("2w")).toBe(14 * 24 * HOUR);
    expect(parseDuration("2 days")).toBe(48 * HOUR);
    expect(parseDuration("3hrs")).toBe(3 * HOUR);
    expect(parseDuration("45 min")).toBe(45 * 60 * 1000);
    expect(parseDuration(" 30S ")).toBe(30 * 1000);
  });

  it("rejects a bare number or an unknown unit", () => {
    expect(parseDuration("123")).toBeNull();
    expect(parseDuration("5 fortnights")).toBeNull();
    expect(parseDuration("-5m")).toBeNull();
  });
});

describe("parseSince", () => {
  const now = 1_000_000_000_000; // 2001-09-09T01:46:40.000Z

  it("counts a duration back from now", () => {
    expect(parseSince("3h", now)).toBe(now - 3 * HOUR);
    expect(parseSince("1 day", now)).toBe(now - 24 * HOUR);
  });

  it("accepts an ISO date-time in the past", () => {
    expect(parseSince("2001-09-09T00:00:00Z", now)).toBe(Date.UTC(2001, 8, 9));
  });

  it("rejects a date-time after now", () => {
    expect(parseSince("2001-09-10T00:00:00Z", now)).toBeNull();
  });

  it("returns null for invalid input", () => {
    expect(parseSince("junk", now)).toBeNull();
    expect(parseSince("123", now)).toBeNull();
    expect(parseSince("", now)).toBeNull();
  });
});
