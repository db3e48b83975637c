import { describe, it, expect } from "vitest";
import {
  findPatternProblem,
  formatDate,
  isSameCalendarDate,
  parseDate,
  toMomentFormat,
} from "../src/utils/dates.js";

const at = new Date(2026, 9, 19, 14, 30, 5);

describe("date patterns", () => {
  it("translates strftime directives and escapes literals", () => {
    expect(toMomentFormat("%Y-%m-%d")).toBe("YYYY[-]MM[-]DD");
    expect(toMomentFormat("%H:%M")).toBe("HH[:]mm");
    expect(toMomentFormat("Week %%")).toBe("[Week %]");
  });

  it("keeps square brackets as literal text", () => {
    expect(toMomentFormat("[%Y] log")).toBe("\\[YYYY\\][ log]");
    expect(formatDate(at, "[%Y] log")).toBe("[2026] log");
    expect(formatDate(at, "%Y-%m-%d [draft]")).toBe("2026-10-19 [draft]");
  });

  it("formats dates", () => {
    expect(formatDate(at, "%Y-%m-%d")).toBe("2026-10-19");
    expect(formatDate(at, "%H:%M")).toBe("14:30");
    expect(formatDate(at, "%H:%M:%S")).toBe("14:30:05");
    expect(formatDate(at, "%A, %B %e")).toBe("Monday, October 19");
    expect(formatDate(at, "%d.%m.%y")).toBe("19.10.26");
    expect(formatDate(at, "%I:%M %p")).toBe("02:30 PM");
    expect(formatDate(at, "day %j")).toBe("day 292");
  });

  it("reports unsupported patterns", () => {
    expect(findPatternProblem("%Y-%m-%d")).toBeNull();
    expect(findPatternProblem("%Q")).toBe("unsupported directive '%Q'");
    expect(findPatternProblem("100%")).toBe("pattern ends with a lone '%'");
    expect(findPatternProblem("[%Y]")).toBeNull();
    expect(() => toMomentFormat("%Q")).toThrow(RangeError);
  });

  it("parses formatted dates back to the same calendar date", () => {
    for (const pattern of ["%Y-%m-%d", "%d.%m.%Y", "%Y/%m/%d %A", "%B %e, %Y", "%Y-%m-%d [draft]"]) {
      const parsed = parseDate(formatDate(at, pattern), pattern);
      expect(parsed).not.toBeNull();
      if (parsed) {
        expect(isSameCalendarDate(parsed, at)).toBe(true);
      }
    }
  });

  it("rejects text that does not match the pattern", () => {
    expect(parseDate("2026-13-45", "%Y-%m-%d")).toBeNull();
    expect(parseDate("notes", "%Y-%m-%d")).toBeNull();
  });
});
