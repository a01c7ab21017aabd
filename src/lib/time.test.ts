import { describe, expect, it } from "vitest";
import { compactDate, monthEnds, monthLabel, normalizeDate, periodLabel } from "./time";

describe("monthEnds", () => {
  it("lists the last day of each month", () => {
    expect(monthEnds("2023-11-01", "2024-02-10")).toEqual(["2023-11-30", "2023-12-31", "2024-01-31", "2024-02-29"]);
  });
});

describe("periodLabel", () => {
  it("spans the first and last quarter", () => {
    expect(periodLabel(["2023-01-31", "2024-06-30", "2025-03-31"])).toBe("Q1 2023 - Q1 2025");
    expect(periodLabel(["2024-11-30"])).toBe("Q4 2024 - Q4 2024");
  });

  it("is null when the axis is empty or not dated", () => {
    expect(periodLabel([])).toBeNull();
    expect(periodLabel(["week 1", "week 2"])).toBeNull();
  });
});

describe("normalizeDate", () => {
  it("formats dates and serial day numbers", () => {
    expect(normalizeDate(new Date(Date.UTC(2024, 2, 31)))).toBe("2024-03-31");
    expect(normalizeDate(45351)).toBe("2024-02-29");
  });

  it("accepts ISO, US and day-first text", () => {
    expect(normalizeDate(" 2024-03-31 ")).toBe("2024-03-31");
    expect(normalizeDate("3/31/2024")).toBe("2024-03-31");
    expect(normalizeDate("31/03/2024")).toBe("2024-03-31");
  });

  it("keeps other labels and drops blanks", () => {
    expect(normalizeDate("Week 12")).toBe("Week 12");
    expect(normalizeDate(12)).toBe("12");
    expect(normalizeDate("  ")).toBeNull();
    expect(normalizeDate(null)).toBeNull();
  });
});

describe("display helpers", () => {
  it("compacts and abbreviates dates", () => {
    expect(compactDate("2025-03-31")).toBe("20250331");
    expect(monthLabel("2025-03-31")).toBe("Mar 25");
    expect(monthLabel("Week 12")).toBe("Week 12");
  });
});
