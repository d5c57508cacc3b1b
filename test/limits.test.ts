import { describe, it, expect } from "vitest";
import {
  fileSizeAllowed,
  formatMinutes,
  formatViews,
  limitsFor,
  resolveDestructMinutes,
  resolveMaxViews,
} from "../src/limits";

describe("tier limits", () => {
  it("premium adds the two-day timer and unlimited views", () => {
    expect(limitsFor(false).destructOptions).not.toContain(2880);
    expect(limitsFor(true).destructOptions).toContain(2880);
    expect(limitsFor(false).viewOptions).not.toContain(0);
    expect(limitsFor(true).viewOptions).toContain(0);
  });

  it("resolves timer choices against the tier", () => {
    expect(resolveDestructMinutes(60, false)).toBe(60);
    expect(resolveDestructMinutes(2880, false)).toBe(0);
    expect(resolveDestructMinutes(2880, true)).toBe(2880);
    expect(resolveDestructMinutes(Number.NaN, true)).toBe(0);
  });

  it("falls back to the free default for out-of-range view counts", () => {
    expect(resolveMaxViews(30, false)).toBe(30);
    expect(resolveMaxViews(0, false)).toBe(1_000_000);
    expect(resolveMaxViews(5_000_001, false)).toBe(1_000_000);
    expect(resolveMaxViews(5_000_000, false)).toBe(5_000_000);
  });

  it("only accepts listed view options for premium", () => {
    expect(resolveMaxViews(0, true)).toBe(0);
    expect(resolveMaxViews(2, true)).toBe(2);
    expect(resolveMaxViews(7, true)).toBe(3_000_000);
  });

  it("checks file sizes in megabytes", () => {
    const mb = 1024 * 1024;
    expect(fileSizeAllowed(1024 * mb, false)).toBe(true);
    expect(fileSizeAllowed(1024 * mb + 1, false)).toBe(false);
    expect(fileSizeAllowed(1500 * mb, true)).toBe(true);
    expect(fileSizeAllowed(undefined, false)).toBe(true);
  });
});

describe("formatting", () => {
  it("formats timers", () => {
    expect(formatMinutes(0)).toBe("No timer");
    expect(formatMinutes(5)).toBe("5 min");
    expect(formatMinutes(120)).toBe("2 hour(s)");
    expect(formatMinutes(2880)).toBe("2 day(s)");
    expect(formatMinutes(90)).toBe("1h 30m");
  });

  it("formats view limits", () => {
    expect(formatViews(0)).toBe("Unlimited");
    expect(formatViews(250_000)).toBe("250,000");
  });
});
