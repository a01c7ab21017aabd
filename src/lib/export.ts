import ExcelJS from "exceljs";
import Papa from "papaparse";
import { toBlob } from "html-to-image";
import type { Category, FilteredView } from "../types";
import { seriesOf } from "./projection";
import { DATE_COLUMN } from "./schema";
import { compactDate } from "./time";

export type ExportKind = "csv" | "xlsx" | "png";

export const EXPORT_MIME: Record<ExportKind, string> = {
  csv: "text/csv",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  png: "image/png",
};

export function viewHeader(view: FilteredView): string[] {
  return [DATE_COLUMN, ...view.columns];
}

/** UTF-8 CSV with a header row and one row per date; values to one decimal. */
export function toCSV(view: FilteredView): Uint8Array {
  const data = view.dates.map((date, row) => [
    date,
    ...view.columns.map((metric) => (seriesOf(view, metric)[row] ?? 0).toFixed(1)),
  ]);
  // An empty view unparses to the header plus one blank row, already newline-terminated.
  const text = Papa.unparse({ fields: viewHeader(view), data }, { newline: "\n" });
  return new TextEncoder().encode(text.endsWith("\n") ? text : `${text}\n`);
}

/** Single-sheet workbook named after the category, same layout as the CSV. */
export async function toSpreadsheet(view: FilteredView): Promise<Uint8Array> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(view.category);
  sheet.addRow(viewHeader(view));
  view.dates.forEach((date, row) => {
    sheet.addRow([date, ...view.columns.map((metric) => seriesOf(view, metric)[row] ?? 0)]);
  });
  sheet.getRow(1).font = { bold: true };
  viewHeader(view).forEach((_, i) => {
    const col = sheet.getColumn(i + 1);
    col.width = i === 0 ? 12 : 18;
    if (i > 0) col.numFmt = "0.0";
  });
  const buffer = await workbook.xlsx.writeBuffer();
  return new Uint8Array(buffer);
}

/** PNG of the element `MetricChart` renders from the current chart spec. */
export async function toImage(node: HTMLElement): Promise<Uint8Array> {
  const blob = await toBlob(node, { pixelRatio: 2, backgroundColor: "#ffffff" });
  if (!blob) throw new Error("Chart could not be rendered to an image");
  return new Uint8Array(await blob.arrayBuffer());
}

export function exportFileName(category: Category, kind: ExportKind, date: string): string {
  const stem = kind === "png" ? "chart" : "esg";
  return `${category.toLowerCase()}_${stem}_${compactDate(date)}.${kind}`;
}

export function downloadBytes(bytes: Uint8Array, fileName: string, mime: string): void {
  const blob = new Blob([bytes.slice()], { type: mime });
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  URL.revokeObjectURL(url);
}
