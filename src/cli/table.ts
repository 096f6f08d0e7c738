// src/cli/table.ts
import type { CellValue, ReportTable } from "../types/models";
import { formatCell } from "../utils/helpers";
import type { Prompter } from "./prompter";

const MAX_COLUMN_WIDTH = 30;

const cellText = (value: CellValue): string => formatCell(value, "-");

const fit = (text: string, width: number): string =>
  text.length > width ? `${text.slice(0, width - 1)}…` : text.padEnd(width);

/** Renders a table as fixed-width console lines (title, header, rule, rows). */
export const renderTable = (table: ReportTable): string[] => {
  const widths = table.columns.map((column, index) =>
    Math.min(
      MAX_COLUMN_WIDTH,
      Math.max(column.length, ...table.rows.map((row) => cellText(row[index] ?? null).length))
    )
  );

  const format = (cells: string[]) =>
    cells.map((cell, index) => fit(cell, widths[index])).join("  ").trimEnd();

  const header = format(table.columns);
  const lines = [table.title, "=".repeat(table.title.length), header, "-".repeat(header.length)];

  if (table.rows.length === 0) {
    lines.push("(no records)");
    return lines;
  }
  for (const row of table.rows) {
    lines.push(format(table.columns.map((_, index) => cellText(row[index] ?? null))));
  }
  return lines;
};

export const printTable = (io: Prompter, table: ReportTable): void => {
  io.print();
  for (const line of renderTable(table)) io.print(line);
};
