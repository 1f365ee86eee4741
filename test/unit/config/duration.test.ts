import { describe, it, expect } from "vitest";
import { formatDuration, parseDuration } from "../../../src/config/duration.js";

describe("parseDuration", () => {
  it("parses single units", () => {
    expect(parseDuration("250ms")).toBe(250);
    expect(parseDuration("30s")).toBe(30_000);
    expect(parseDuration("5m")).toBe(300_000);
    expect(parseDuration("2h")).toBe(7_200_000);
  });

  it("parses combined durations", () => {
    expect(parseDuration("1h30m")).toBe(5_400_000);
    expect(parseDuration("1m30s")).toBe(90_000);
    expect(parseDuration("1s500ms")).toBe(1_500);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseDuration(" 20m ")).toBe(1_200_000);
  });

  it("throws on empty or malformed input", () => {
    expect(() => parseDuration("")).toThrow('Invalid duration string: ""');
    expect(() => parseDuration("5")).toThrow("Invalid duration string");
    expect(() => parseDuration("5d")).toThrow("Invalid duration string");
    expect(() => parseDuration("m5")).toThrow("Invalid duration string");
    expect(() => parseDuration("5m abc")).toThrow("Invalid duration string");
  });

  it("throws on zero duration", () => {
    expect(() => parseDuration("0s")).toThrow("Invalid duration string");
  });
});

describe("formatDuration", () => {
  it("renders the largest units first", () => {
    expect(formatDuration(5_400_000)).toBe("1h30m");
    expect(formatDuration(90_500)).toBe("1m30s500ms");
    expect(formatDuration(250)).toBe("250ms");
  });

  it("renders non-positive values as 0ms", () => {
    expect(formatDuration(0)).toBe("0ms");
  });

  it("parses back to the same value", () => {
    expect(parseDuration(formatDuration(3_723_000))).toBe(3_723_000);
  });
});
