// src/utils/csv.ts
import type { CellValue, ReportTable } from "../types/models";
import { formatCell } from "./helpers";

const NEEDS_QUOTING = /[",\r\n]/;

export const escapeCsvField = (value: CellValue): string => {
  const text = formatCell(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsvLine = (values: CellValue[]): string =>
  values.map(escapeCsvField).join(",");

/** Header line plus one line per row, newline-terminated. */
export const toCsv = (table: Pick<ReportTable, "columns" | "rows">): string =>
  [table.columns, ...table.rows].map(toCsvLine).join("\n") + "\n";
