import { describe, expect, it } from "vitest";
import { CATEGORIES } from "../types";
import { ESG_SCHEMA } from "./schema";
import { SYNTHETIC_TARGETS, generateSyntheticDataset, getSyntheticDataset } from "./synthetic";

describe("synthetic dataset", () => {
  it("spans 27 month-end dates from 2023-01-31 to 2025-03-31", () => {
    const { dates } = getSyntheticDataset().tables.Environmental;
    expect(dates).toHaveLength(27);
    expect(dates[0]).toBe("2023-01-31");
    expect(dates[1]).toBe("2023-02-28");
    expect(dates[13]).toBe("2024-02-29");
    expect(dates[26]).toBe("2025-03-31");
  });

  it("shares one date axis across categories", () => {
    const { tables } = getSyntheticDataset();
    expect(tables.Social.dates).toEqual(tables.Environmental.dates);
    expect(tables.Governance.dates).toEqual(tables.Environmental.dates);
  });

  it("is deterministic across invocations", () => {
    expect(generateSyntheticDataset()).toEqual(generateSyntheticDataset());
    expect(getSyntheticDataset()).toBe(getSyntheticDataset());
  });

  it("differs for another seed", () => {
    const a = generateSyntheticDataset(42).tables.Environmental.values["Waste Recycled (%)"];
    const b = generateSyntheticDataset(7).tables.Environmental.values["Waste Recycled (%)"];
    expect(a).not.toEqual(b);
  });

  it("carries the standard metrics in schema order with aligned series", () => {
    const { tables } = getSyntheticDataset();
    for (const category of CATEGORIES) {
      const table = tables[category];
      expect(table.columns).toEqual(ESG_SCHEMA[category].map((m) => m.name));
      for (const metric of table.columns) {
        expect(table.values[metric]).toHaveLength(27);
      }
    }
  });

  it("keeps percentage and score metrics within [0, 100]", () => {
    const { tables } = getSyntheticDataset();
    const bounded = [
      tables.Environmental.values["Waste Recycled (%)"],
      tables.Social.values["Diversity (% women)"],
      tables.Governance.values["Ethics Training (%)"],
      tables.Governance.values["Transparency Score"],
    ];
    for (const series of bounded) {
      expect(Math.min(...series)).toBeGreaterThanOrEqual(0);
      expect(Math.max(...series)).toBeLessThanOrEqual(100);
    }
  });

  it("accumulates count metrics as non-decreasing integers", () => {
    const series = getSyntheticDataset().tables.Governance.values["Supplier Audits"];
    series.forEach((v, i) => {
      expect(Number.isInteger(v)).toBe(true);
      if (i > 0) expect(v).toBeGreaterThanOrEqual(series[i - 1]);
    });
  });

  it("returns the fixed target map and freezes the cached value", () => {
    const dataset = getSyntheticDataset();
    expect(dataset.targets).toEqual(SYNTHETIC_TARGETS);
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.tables.Social.values["Safety Incidents"])).toBe(true);
  });
});
