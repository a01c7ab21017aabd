import ExcelJS from "exceljs";
import Papa from "papaparse";
import { describe, expect, it } from "vitest";
import type { FilteredView } from "../types";
import { toArrayBuffer } from "./bytes";
import { exportFileName, toCSV, toSpreadsheet, viewHeader } from "./export";
import { metricNames, project } from "./projection";
import { getSyntheticDataset } from "./synthetic";

const view: FilteredView = {
  category: "Environmental",
  dates: ["2024-01-31", "2024-02-29"],
  columns: ["CO2 Emissions (tons)", "Waste Recycled (%)"],
  values: {
    "CO2 Emissions (tons)": [1.234, 2],
    "Waste Recycled (%)": [80, 81.26],
  },
};

describe("toCSV", () => {
  it("writes a header and one line per date with one decimal", () => {
    const text = new TextDecoder().decode(toCSV(view));
    expect(text).toBe(
      "Date,CO2 Emissions (tons),Waste Recycled (%)\n" +
        "2024-01-31,1.2,80.0\n" +
        "2024-02-29,2.0,81.3\n"
    );
  });

  it("quotes metric names that contain commas", () => {
    const text = new TextDecoder().decode(
      toCSV({ ...view, columns: ["Spend ($, k)"], values: { "Spend ($, k)": [1, 2] } })
    );
    const parsed = Papa.parse<string[]>(text, { skipEmptyLines: true });
    expect(parsed.data[0]).toEqual(["Date", "Spend ($, k)"]);
    expect(parsed.data[2]).toEqual(["2024-02-29", "2.0"]);
  });

  it("writes only the header for an empty view", () => {
    const text = new TextDecoder().decode(toCSV({ ...view, dates: [], columns: [], values: {} }));
    expect(text).toBe("Date\n");
  });

  it("reads back as the projected view", () => {
    const dataset = getSyntheticDataset();
    const projected = project(dataset, "Social", 12, metricNames(dataset, "Social"));
    const parsed = Papa.parse<string[]>(new TextDecoder().decode(toCSV(projected)), { skipEmptyLines: true });
    const [header, ...rows] = parsed.data;

    expect(parsed.errors).toEqual([]);
    expect(header).toEqual(["Date", ...projected.columns]);
    expect(rows).toHaveLength(12);
    rows.forEach((row, r) => {
      expect(row[0]).toBe(projected.dates[r]);
      projected.columns.forEach((metric, c) => {
        expect(Math.abs(Number(row[c + 1]) - projected.values[metric][r])).toBeLessThanOrEqual(0.05);
      });
    });
  });
});

describe("toSpreadsheet", () => {
  it("writes one sheet named after the category", async () => {
    const bytes = await toSpreadsheet(view);
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(toArrayBuffer(bytes));

    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(["Environmental"]);
    const sheet = workbook.getWorksheet("Environmental");
    expect(sheet?.getRow(1).values).toEqual([undefined, ...viewHeader(view)]);
    expect(sheet?.getRow(2).values).toEqual([undefined, "2024-01-31", 1.234, 80]);
    expect(sheet?.getRow(3).getCell(3).value).toBe(81.26);
    expect(sheet?.rowCount).toBe(3);
  });
});

describe("exportFileName", () => {
  it("names files by category, kind and last date", () => {
    expect(exportFileName("Environmental", "csv", "2025-03-31")).toBe("environmental_esg_20250331.csv");
    expect(exportFileName("Social", "xlsx", "2025-03-31")).toBe("social_esg_20250331.xlsx");
    expect(exportFileName("Governance", "png", "2024-12-31")).toBe("governance_chart_20241231.png");
  });
});
