import { CATEGORIES, type Category, type Polarity } from "../types";
import { SchemaError, fail, ok, type Result } from "./errors";

export const DATE_COLUMN = "Date";
export const TARGETS_SHEET = "Targets";
export const TARGET_METRIC_COLUMN = "Metric";
export const REQUIRED_SHEETS = [...CATEGORIES, TARGETS_SHEET] as const;

const LOWER_IS_BETTER_MARKERS = ["Emissions", "Usage", "Violations"];

// Name heuristic kept for compatibility with existing workbooks; see DESIGN.md.
export function polarityOf(metric: string): Polarity {
  return LOWER_IS_BETTER_MARKERS.some((m) => metric.includes(m)) ? "lower-is-better" : "higher-is-better";
}

export type MetricSpec = { name: string; polarity: Polarity };

const spec = (name: string): MetricSpec => ({ name, polarity: polarityOf(name) });

/** Standard metrics per category, in display order. */
export const ESG_SCHEMA: Readonly<Record<Category, readonly MetricSpec[]>> = {
  Environmental: [
    spec("CO2 Emissions (tons)"),
    spec("Energy Consumption (MWh)"),
    spec("Water Usage (m³)"),
    spec("Waste Recycled (%)"),
    spec("Sustainable Materials (%)"),
  ],
  Social: [
    spec("Safety Incidents"),
    spec("Employee Training (hours)"),
    spec("Diversity (% women)"),
    spec("Community Investment ($)"),
    spec("Worker Satisfaction (score)"),
  ],
  Governance: [
    spec("Ethics Training (%)"),
    spec("Supplier Audits"),
    spec("Board Diversity (%)"),
    spec("Compliance Violations"),
    spec("Transparency Score"),
  ],
};

export function columnPrefix(category: Category): string {
  return `${category}_`;
}

/** Metric columns of each category sheet, in sheet order. */
export type WorkbookShape = Record<Category, string[]>;

export type SheetHeaders = Readonly<Record<string, readonly string[]>>;

/**
 * Checks a workbook's sheet names and header rows. Missing sheets are
 * reported on their own (`Missing sheets: …`); when every sheet is present,
 * absent required columns are reported as `<Sheet>.<Column>`.
 */
export function validateWorkbook(
  sheetNames: readonly string[],
  headers: SheetHeaders
): Result<WorkbookShape, SchemaError> {
  const missingSheets = REQUIRED_SHEETS.filter((s) => !sheetNames.includes(s));
  if (missingSheets.length) {
    return fail(new SchemaError(missingSheets, `Missing sheets: ${missingSheets.join(", ")}`));
  }

  const missingColumns: string[] = [];
  const shape: WorkbookShape = { Environmental: [], Social: [], Governance: [] };
  for (const category of CATEGORIES) {
    const cols = (headers[category] ?? []).map((c) => c.trim());
    if (!cols.includes(DATE_COLUMN)) missingColumns.push(`${category}.${DATE_COLUMN}`);
    shape[category] = cols.filter((c) => c && c !== DATE_COLUMN);
  }
  const targetCols = (headers[TARGETS_SHEET] ?? []).map((c) => c.trim());
  if (!targetCols.includes(TARGET_METRIC_COLUMN)) {
    missingColumns.push(`${TARGETS_SHEET}.${TARGET_METRIC_COLUMN}`);
  }

  if (missingColumns.length) {
    return fail(new SchemaError(missingColumns, `Missing columns: ${missingColumns.join(", ")}`));
  }
  return ok(shape);
}

/** Source column name and metric name (prefix stripped) for one category. */
export type WideColumn = { source: string; metric: string };

export type WideTableShape = Record<Category, WideColumn[]>;

/**
 * Slices the header of a single wide table by category prefix. Requires the
 * `Date` column and at least one prefixed column; a category with no columns
 * gets an empty list.
 */
export function validateWideTable(columns: readonly string[]): Result<WideTableShape, SchemaError> {
  const trimmed = columns.map((c) => c.trim());
  const shape: WideTableShape = { Environmental: [], Social: [], Governance: [] };
  for (const source of trimmed) {
    for (const category of CATEGORIES) {
      const prefix = columnPrefix(category);
      if (source.startsWith(prefix) && source.length > prefix.length) {
        shape[category].push({ source, metric: source.slice(prefix.length) });
        break;
      }
    }
  }

  const missing: string[] = [];
  if (!trimmed.includes(DATE_COLUMN)) missing.push(DATE_COLUMN);
  if (CATEGORIES.every((c) => shape[c].length === 0)) {
    missing.push(CATEGORIES.map(columnPrefix).map((p) => `${p}*`).join(" | "));
  }
  if (missing.length) {
    return fail(new SchemaError(missing, `Missing columns: ${missing.join(", ")}`));
  }
  return ok(shape);
}
