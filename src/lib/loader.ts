import ExcelJS from "exceljs";
import Papa from "papaparse";
import { z } from "zod";
import { CATEGORIES, type Category, type DataSource, type Dataset, type MetricTable, type TargetMap } from "../types";
import { fetchRemoteFile } from "./api";
import { toArrayBuffer } from "./bytes";
import { LoadError, ParseError, UnsupportedSourceError, errorMessage, type LoadResult } from "./errors";
import {
  DATE_COLUMN,
  TARGETS_SHEET,
  validateWideTable,
  validateWorkbook,
  type SheetHeaders,
} from "./schema";
import { deepFreeze, getSyntheticDataset, syntheticTargets } from "./synthetic";
import { isIsoDate, normalizeDate } from "./time";

type Cell = string | number | Date | null;

/** A header row plus data rows; every data row is as wide as the header. */
type Grid = { name: string; header: string[]; rows: Cell[][] };

export type RemoteFormat = "delimited" | "spreadsheet";

export type LoadOptions = { timeoutMs?: number };

/**
 * Loads a dataset from any supported source. Data problems resolve to
 * `{ ok: false }`; the promise itself does not reject for them.
 */
export async function load(source: DataSource, options: LoadOptions = {}): Promise<LoadResult> {
  try {
    return { ok: true, dataset: await loadOrThrow(source, options) };
  } catch (err) {
    if (err instanceof LoadError) return { ok: false, error: err };
    return { ok: false, error: new ParseError(errorMessage(err)) };
  }
}

async function loadOrThrow(source: DataSource, options: LoadOptions): Promise<Dataset> {
  switch (source.kind) {
    case "synthetic":
      return getSyntheticDataset();
    case "spreadsheet":
      return parseWorkbook(source.bytes);
    case "delimited":
      return parseDelimited(source.text);
    case "remote": {
      const format = remoteFormat(source.url);
      const file = await fetchRemoteFile(source.url, options.timeoutMs);
      if (format === "spreadsheet") return parseWorkbook(file.bytes);
      return parseDelimited(new TextDecoder("utf-8").decode(file.bytes));
    }
  }
}

/** Picks the parser from the URL path suffix; query and fragment are ignored. */
export function remoteFormat(url: string): RemoteFormat {
  let path: string;
  try {
    path = new URL(url).pathname.toLowerCase();
  } catch {
    throw new UnsupportedSourceError(`Invalid URL: ${url}`);
  }
  if (path.endsWith(".csv")) return "delimited";
  if (path.endsWith(".xlsx") || path.endsWith(".xls")) return "spreadsheet";
  throw new UnsupportedSourceError("Unsupported file format from URL. Please use CSV or Excel.");
}

// ---------------------------------------------------------------- workbook

export async function parseWorkbook(bytes: ArrayBuffer | Uint8Array): Promise<Dataset> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(toArrayBuffer(bytes));
  } catch (err) {
    throw new ParseError(`Could not read workbook: ${errorMessage(err)}`);
  }

  const grids = new Map<string, Grid>();
  for (const ws of workbook.worksheets) {
    grids.set(ws.name, worksheetGrid(ws));
  }

  const headers: SheetHeaders = Object.fromEntries(Array.from(grids, ([name, grid]) => [name, grid.header]));
  const checked = validateWorkbook(Array.from(grids.keys()), headers);
  if (!checked.ok) throw checked.error;

  const table = (category: Category): MetricTable => {
    const grid = grids.get(category);
    if (!grid) throw new ParseError(`${category} sheet disappeared while reading`);
    return gridTable(grid, checked.value[category].map((c) => ({ source: c, metric: c })));
  };
  const targetsGrid = grids.get(TARGETS_SHEET);
  if (!targetsGrid) throw new ParseError(`${TARGETS_SHEET} sheet disappeared while reading`);

  return deepFreeze({
    tables: { Environmental: table("Environmental"), Social: table("Social"), Governance: table("Governance") },
    targets: parseTargets(targetsGrid),
  });
}

function worksheetGrid(ws: ExcelJS.Worksheet): Grid {
  const raw: Cell[][] = [];
  const width = ws.columnCount;
  ws.eachRow({ includeEmpty: false }, (row) => {
    const cells: Cell[] = [];
    for (let c = 1; c <= width; c++) cells.push(plainCell(row.getCell(c).value));
    raw.push(cells);
  });

  const [head = [], ...body] = raw;
  // Trailing blank header cells are formatting leftovers, not columns.
  let headerWidth = head.length;
  while (headerWidth > 0 && headerText(head[headerWidth - 1]) === "") headerWidth--;
  const header = head.slice(0, headerWidth).map(headerText);
  const rows = body
    .filter((r) => r.some((v) => v !== null))
    .map((r) => r.slice(0, headerWidth));
  return { name: ws.name, header, rows };
}

function plainCell(value: ExcelJS.CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string" || value instanceof Date) return value;
  if (typeof value === "boolean") return String(value);
  if ("richText" in value) return value.richText.map((t) => t.text).join("");
  if ("formula" in value || "sharedFormula" in value) {
    const result = value.result;
    if (result === undefined || (typeof result === "object" && !(result instanceof Date))) return null;
    return plainCell(result);
  }
  if ("text" in value && typeof value.text === "string") return value.text;
  return null;
}

function headerText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return "";
  if (cell instanceof Date) return cell.toISOString().slice(0, 10);
  return String(cell).trim();
}

// --------------------------------------------------------------- delimited

export function parseDelimited(text: string): Dataset {
  const grid = delimitedGrid(text.replace(/^\uFEFF/, ""));
  const checked = validateWideTable(grid.header);
  if (!checked.ok) throw checked.error;

  const table = (category: Category) => gridTable(grid, checked.value[category]);
  return deepFreeze({
    tables: { Environmental: table("Environmental"), Social: table("Social"), Governance: table("Governance") },
    // The delimited layout carries no goals.
    targets: syntheticTargets(),
  });
}

function delimitedGrid(text: string): Grid {
  const parsed = Papa.parse<string[]>(text, { skipEmptyLines: "greedy" });
  const fatal = parsed.errors.find((e) => e.type === "Quotes");
  if (fatal) {
    const where = fatal.row !== undefined ? ` (row ${fatal.row + 1})` : "";
    throw new ParseError(`Malformed CSV${where}: ${fatal.message}`);
  }
  const [head, ...body] = parsed.data;
  if (!head) throw new ParseError("CSV file is empty");

  const header = head.map((h) => h.trim());
  body.forEach((row, i) => {
    if (row.length !== header.length) {
      throw new ParseError(`CSV row ${i + 2} has ${row.length} fields, expected ${header.length}`);
    }
  });
  return { name: "CSV", header, rows: body.map((row) => row.map((v) => (v.trim() === "" ? null : v))) };
}

// ------------------------------------------------------------------ shared

function gridTable(grid: Grid, columns: ReadonlyArray<{ source: string; metric: string }>): MetricTable {
  const dateIdx = grid.header.indexOf(DATE_COLUMN);
  if (dateIdx < 0) throw new ParseError(`${grid.name}: no ${DATE_COLUMN} column`);
  if (!grid.rows.length) throw new ParseError(`${grid.name}: no data rows`);

  const seen = new Set<string>();
  for (const { metric } of columns) {
    if (seen.has(metric)) throw new ParseError(`${grid.name}: duplicate column "${metric}"`);
    seen.add(metric);
  }

  const labels = grid.rows.map((row, i) => {
    const date = normalizeDate(row[dateIdx]);
    if (date === null) throw new ParseError(`${grid.name} row ${i + 2}: missing ${DATE_COLUMN}`);
    return date;
  });

  const firstRow = new Map<string, number>();
  labels.forEach((date, i) => {
    const seenAt = firstRow.get(date);
    if (seenAt !== undefined) {
      throw new ParseError(`${grid.name} row ${i + 2}: duplicate ${DATE_COLUMN} ${date} (first on row ${seenAt + 2})`);
    }
    firstRow.set(date, i);
  });

  // Dated tables are put in ascending order; other labels keep file order.
  const order = labels.map((_, i) => i);
  if (labels.every(isIsoDate)) {
    order.sort((a, b) => (labels[a] < labels[b] ? -1 : labels[a] > labels[b] ? 1 : 0));
  }

  const series = columns.map(({ source, metric }): [string, number[]] => {
    const idx = grid.header.indexOf(source);
    const parsed = grid.rows.map((row, i) => {
      const n = toNumber(row[idx]);
      if (n === null) {
        throw new ParseError(`${grid.name} row ${i + 2}: "${source}" is not a number (${String(row[idx] ?? "empty")})`);
      }
      return n;
    });
    return [metric, order.map((i) => parsed[i])];
  });

  // fromEntries defines own properties, so names like "__proto__" stay plain columns.
  return {
    dates: order.map((i) => labels[i]),
    columns: columns.map((c) => c.metric),
    values: Object.fromEntries(series),
  };
}

const goal = z.preprocess(
  (v) => (v === null || v === undefined ? undefined : typeof v === "string" ? Number(v.trim().replace(/,/g, "")) : v),
  z.number().finite().optional()
);

const TargetRow = z.object({
  Metric: z.preprocess((v) => (v === null || v === undefined ? "" : String(v)), z.string().trim()),
  Environmental: goal,
  Social: goal,
  Governance: goal,
});

function parseTargets(grid: Grid): Record<Category, TargetMap> {
  const targets: Record<Category, Map<string, number>> = {
    Environmental: new Map(),
    Social: new Map(),
    Governance: new Map(),
  };

  grid.rows.forEach((row, i) => {
    const record = Object.fromEntries(grid.header.map((col, idx) => [col, row[idx] ?? null]));
    const parsed = TargetRow.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
      throw new ParseError(`${TARGETS_SHEET} row ${i + 2}: ${where}${issue?.message ?? "invalid row"}`);
    }
    const { Metric: metric, ...goals } = parsed.data;
    if (!metric) return;
    for (const category of CATEGORIES) {
      const value = goals[category];
      if (value !== undefined) targets[category].set(metric, value);
    }
  });
  return {
    Environmental: Object.fromEntries(targets.Environmental),
    Social: Object.fromEntries(targets.Social),
    Governance: Object.fromEntries(targets.Governance),
  };
}

function toNumber(cell: Cell | undefined): number | null {
  if (typeof cell === "number") return Number.isFinite(cell) ? cell : null;
  if (typeof cell !== "string") return null;
  const t = cell.trim().replace(/,/g, "");
  if (!t) return null;
  const n = Number(t);
  return Number.isFinite(n) ? n : null;
}
