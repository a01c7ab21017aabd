import { describe, expect, it } from "vitest";
import type { FilteredView } from "../types";
import { PALETTE, buildChartSpec, linearFit, trendValues } from "./chart";

const view: FilteredView = {
  category: "Social",
  dates: ["2024-01-31", "2024-02-29", "2024-03-31"],
  columns: ["Safety Incidents", "Diversity (% women)"],
  values: {
    "Safety Incidents": [1, 3, 5],
    "Diversity (% women)": [30, 30, 33],
  },
};

describe("linearFit", () => {
  it("fits a straight line exactly", () => {
    expect(linearFit([1, 3, 5])).toEqual({ slope: 2, intercept: 1 });
    expect(trendValues([1, 3, 5])).toEqual([1, 3, 5]);
  });

  it("gives a flat line for a single point", () => {
    expect(linearFit([7])).toEqual({ slope: 0, intercept: 7 });
  });

  it("is zero for no points", () => {
    expect(linearFit([])).toEqual({ slope: 0, intercept: 0 });
  });
});

describe("buildChartSpec", () => {
  it("plots one series per metric against the dates", () => {
    const spec = buildChartSpec(view, {}, { chartKind: "Bar", showGoals: false, showTrend: false });
    expect(spec.kind).toBe("Bar");
    expect(spec.title).toBe("Social Comparisons");
    expect(spec.goals).toEqual([]);
    expect(spec.series).toEqual([
      { key: "m0", name: "Safety Incidents", color: PALETTE[0], role: "metric", dashed: false },
      { key: "m1", name: "Diversity (% women)", color: PALETTE[1], role: "metric", dashed: false },
    ]);
    expect(spec.points).toEqual([
      { date: "2024-01-31", m0: 1, m1: 30 },
      { date: "2024-02-29", m0: 3, m1: 30 },
      { date: "2024-03-31", m0: 5, m1: 33 },
    ]);
  });

  it("adds goal lines with a 0 default", () => {
    const spec = buildChartSpec(view, { "Diversity (% women)": 40 }, {
      chartKind: "Line",
      showGoals: true,
      showTrend: false,
    });
    expect(spec.title).toBe("Social Trends");
    expect(spec.goals).toEqual([
      { metric: "Safety Incidents", value: 0, label: "Goal: Safety Incidents", color: PALETTE[0] },
      { metric: "Diversity (% women)", value: 40, label: "Goal: Diversity (% women)", color: PALETTE[1] },
    ]);
  });

  it("ignores inherited members of the target map", () => {
    const spec = buildChartSpec(
      { ...view, columns: ["constructor"], values: { constructor: [2, 4, 6] } },
      {},
      { chartKind: "Line", showGoals: true, showTrend: true }
    );
    expect(spec.goals).toEqual([{ metric: "constructor", value: 0, label: "Goal: constructor", color: PALETTE[0] }]);
    expect(spec.points[2]).toEqual({ date: "2024-03-31", m0: 6, t0: 6 });
  });

  it("adds a dashed trend series after each metric", () => {
    const spec = buildChartSpec(view, {}, { chartKind: "Area", showGoals: false, showTrend: true });
    expect(spec.title).toBe("Social Cumulative");
    expect(spec.series.map((s) => [s.key, s.name, s.dashed])).toEqual([
      ["m0", "Safety Incidents", false],
      ["t0", "Safety Incidents Trend", true],
      ["m1", "Diversity (% women)", false],
      ["t1", "Diversity (% women) Trend", true],
    ]);
    expect(spec.points.map((p) => p.t0)).toEqual([1, 3, 5]);
    const t1 = spec.points.map((p) => Number(p.t1));
    expect(t1[0]).toBeCloseTo(29.5, 10);
    expect(t1[2]).toBeCloseTo(32.5, 10);
  });

  it("keeps dates for an empty selection", () => {
    const spec = buildChartSpec({ ...view, columns: [], values: {} }, {}, {
      chartKind: "Scatter",
      showGoals: true,
      showTrend: true,
    });
    expect(spec.title).toBe("Social Points");
    expect(spec.series).toEqual([]);
    expect(spec.points).toEqual([{ date: "2024-01-31" }, { date: "2024-02-29" }, { date: "2024-03-31" }]);
  });
});
