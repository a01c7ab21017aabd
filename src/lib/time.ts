import { eachMonthOfInterval, endOfMonth, format, isValid, parse, parseISO } from "date-fns";

export const ISO_DATE = "yyyy-MM-dd";

export type Quarter = { year: number; quarter: number };

/** Month-end dates from the month of `start` through the month of `end`, as `yyyy-MM-dd`. */
export function monthEnds(start: string, end: string): string[] {
  return eachMonthOfInterval({ start: parseISO(start), end: parseISO(end) }).map((d) =>
    format(endOfMonth(d), ISO_DATE)
  );
}

export function formatQuarter(year: number, quarter: number): string {
  return `Q${quarter} ${year}`;
}

export function quarterOf(date: string): Quarter | null {
  const d = parseISO(date);
  if (!isValid(d)) return null;
  return { year: d.getFullYear(), quarter: Math.floor(d.getMonth() / 3) + 1 };
}

/** "Q1 2023 - Q1 2025" for an axis, or null when either end is not a date. */
export function periodLabel(dates: readonly string[]): string | null {
  if (!dates.length) return null;
  const first = quarterOf(dates[0]);
  const last = quarterOf(dates[dates.length - 1]);
  if (!first || !last) return null;
  return `${formatQuarter(first.year, first.quarter)} - ${formatQuarter(last.year, last.quarter)}`;
}

const EXCEL_EPOCH = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;

// Serial day numbers for 1954..2119; smaller numbers are more likely years or ids.
function isExcelSerial(value: number): boolean {
  return value > 20_000 && value < 80_000;
}

function excelSerialDate(serial: number): string {
  return new Date(EXCEL_EPOCH + Math.round(serial) * DAY_MS).toISOString().slice(0, 10);
}

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(label: string): boolean {
  return ISO_DAY.test(label);
}

const DAY_FIRST = ["dd/MM/yyyy", "d/M/yyyy"];
const MONTH_FIRST = ["MM/dd/yyyy", "M/d/yyyy"];

/**
 * Normalizes a Date cell to `yyyy-MM-dd`. Spreadsheet dates arrive as UTC
 * midnight or as serial day numbers; text is tried as ISO, then US, then
 * day-first. Anything else is kept as trimmed text.
 */
export function normalizeDate(value: unknown): string | null {
  if (value instanceof Date) {
    return isValid(value) ? value.toISOString().slice(0, 10) : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return isExcelSerial(value) ? excelSerialDate(value) : String(value);
  }
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text) return null;

  const iso = parseISO(text);
  if (isValid(iso)) return format(iso, ISO_DATE);
  for (const pattern of [...MONTH_FIRST, ...DAY_FIRST]) {
    const d = parse(text, pattern, new Date(2000, 0, 1));
    if (isValid(d)) return format(d, ISO_DATE);
  }
  return text;
}

export function compactDate(date: string): string {
  return date.replace(/-/g, "");
}

export function monthLabel(date: string): string {
  const d = parseISO(date);
  return isValid(d) ? format(d, "MMM yy") : date;
}
