// src/controllers/reportController.ts
import type { Action } from "../cli/context";
import { askInteger, confirm } from "../cli/prompter";
import { printTable } from "../cli/table";
import { REPORT_KEYS, REPORTS, type ReportKey } from "../services/reportService";

/** Prints one report and offers to save it as CSV. */
export const showReport =
  (key: ReportKey): Action =>
  async ({ io, services }) => {
    const table = services.reports.buildReport(key);
    printTable(io, table);
    if (table.rows.length > 0 && (await confirm(io, "\nExport to CSV?"))) {
      const result = services.exports.exportTable(table);
      io.print(`Exported ${result.recordsExported} record(s) to ${result.filePath}`);
    }
  };

export const exportData: Action = async ({ io, services }) => {
  io.print("\nAvailable exports:");
  REPORT_KEYS.forEach((key, index) => io.print(`${index + 1}. ${REPORTS[key]}`));
  const choice = await askInteger(io, "Export number");
  const key: ReportKey | undefined = REPORT_KEYS[choice - 1];
  if (!key) {
    io.print(`Please enter a number between 1 and ${REPORT_KEYS.length}.`);
    return;
  }
  const result = services.exports.exportTable(services.reports.buildReport(key));
  io.print(`\nExported ${result.recordsExported} record(s) to ${result.filePath}`);
};
