import { describe, it, expect } from "vitest";
import { formatLocal, normalizeLocal, parseLocal, toZonedLocal } from "../src/utils/localTime.js";

describe("normalizeLocal", () => {
  it("adds missing seconds", () => {
    expect(normalizeLocal("2025-10-02T14:00")).toBe("2025-10-02T14:00:00");
  });

  it("accepts a space separator and drops a zone offset", () => {
    expect(normalizeLocal("2025-10-02 14:00:00+08:00")).toBe("2025-10-02T14:00:00");
  });

  it("drops fractional seconds and a Z suffix without shifting the clock", () => {
    expect(normalizeLocal("2025-10-02T14:00:00.000Z")).toBe("2025-10-02T14:00:00");
  });

  it("rejects dates that do not exist", () => {
    expect(normalizeLocal("2025-02-30T10:00:00")).toBeNull();
    expect(normalizeLocal("2025-13-01T10:00:00")).toBeNull();
  });

  it("rejects free text and bare dates", () => {
    expect(normalizeLocal("tomorrow at 2")).toBeNull();
    expect(normalizeLocal("2025-10-02")).toBeNull();
  });
});

describe("parseLocal / formatLocal", () => {
  it("reads the wall-clock fields", () => {
    const d = parseLocal("2025-10-02T14:05:09");
    expect(d?.getFullYear()).toBe(2025);
    expect(d?.getMonth()).toBe(9);
    expect(d?.getDate()).toBe(2);
    expect(d?.getHours()).toBe(14);
    expect(d?.getMinutes()).toBe(5);
    expect(d?.getSeconds()).toBe(9);
  });

  it("formats a local date", () => {
    expect(formatLocal(new Date(2025, 9, 2, 14, 0, 0))).toBe("2025-10-02T14:00:00");
  });
});

describe("toZonedLocal", () => {
  it("renders an instant in the calendar zone", () => {
    expect(toZonedLocal(new Date("2025-10-01T02:00:00Z"), "Asia/Taipei")).toBe("2025-10-01T10:00:00");
  });

  it("rolls over the date when the zone is ahead", () => {
    expect(toZonedLocal(new Date("2025-12-31T20:30:00Z"), "Asia/Taipei")).toBe("2026-01-01T04:30:00");
  });

  it("renders midnight as 00, not 24", () => {
    expect(toZonedLocal(new Date("2025-10-01T16:00:00Z"), "Asia/Taipei")).toBe("2025-10-02T00:00:00");
  });
});
