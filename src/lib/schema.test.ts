import { describe, expect, it } from "vitest";
import { SchemaError } from "./errors";
import { ESG_SCHEMA, polarityOf, validateWideTable, validateWorkbook } from "./schema";

describe("polarityOf", () => {
  it("treats emissions, usage and violations as lower-is-better", () => {
    expect(polarityOf("CO2 Emissions (tons)")).toBe("lower-is-better");
    expect(polarityOf("Water Usage (m³)")).toBe("lower-is-better");
    expect(polarityOf("Compliance Violations")).toBe("lower-is-better");
  });

  it("treats everything else as higher-is-better", () => {
    expect(polarityOf("Safety Incidents")).toBe("higher-is-better");
    expect(polarityOf("Energy Consumption (MWh)")).toBe("higher-is-better");
    expect(polarityOf("emissions")).toBe("higher-is-better");
  });

  it("is what the schema descriptor records", () => {
    expect(ESG_SCHEMA.Environmental[0]).toEqual({ name: "CO2 Emissions (tons)", polarity: "lower-is-better" });
    expect(ESG_SCHEMA.Governance[4]).toEqual({ name: "Transparency Score", polarity: "higher-is-better" });
  });
});

describe("validateWorkbook", () => {
  const headers = {
    Environmental: ["Date", "CO2 Emissions (tons)"],
    Social: ["Date", "Safety Incidents"],
    Governance: ["Date", "Transparency Score"],
    Targets: ["Metric", "Environmental", "Social", "Governance"],
  };

  it("returns the metric columns of each category sheet", () => {
    const result = validateWorkbook(Object.keys(headers), headers);
    expect(result).toEqual({
      ok: true,
      value: {
        Environmental: ["CO2 Emissions (tons)"],
        Social: ["Safety Incidents"],
        Governance: ["Transparency Score"],
      },
    });
  });

  it("names every missing sheet", () => {
    const result = validateWorkbook(["Environmental", "Notes"], headers);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(SchemaError);
    expect(result.error.missing).toEqual(["Social", "Governance", "Targets"]);
    expect(result.error.message).toBe("Missing sheets: Social, Governance, Targets");
  });

  it("names missing required columns once all sheets exist", () => {
    const result = validateWorkbook(Object.keys(headers), {
      ...headers,
      Social: ["When", "Safety Incidents"],
      Targets: ["Name", "Social"],
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.missing).toEqual(["Social.Date", "Targets.Metric"]);
  });
});

describe("validateWideTable", () => {
  it("splits prefixed columns per category and strips the prefix", () => {
    const result = validateWideTable(["Date", "Environmental_X", "Social_Y", "Notes"]);
    expect(result).toEqual({
      ok: true,
      value: {
        Environmental: [{ source: "Environmental_X", metric: "X" }],
        Social: [{ source: "Social_Y", metric: "Y" }],
        Governance: [],
      },
    });
  });

  it("requires a Date column", () => {
    const result = validateWideTable(["Environmental_X"]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.missing).toEqual(["Date"]);
  });

  it("requires at least one prefixed column", () => {
    const result = validateWideTable(["Date", "Other"]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.missing).toEqual(["Environmental_* | Social_* | Governance_*"]);
  });
});
