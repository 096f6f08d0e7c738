// src/services/exportService.ts
import fs from "fs";
import path from "path";
import { format } from "date-fns";
import type { AppConfig } from "../config";
import type { ExportResult, ReportTable } from "../types/models";
import { toCsv } from "../utils/csv";
import { StorageError } from "../utils/errors";
import type { AuthService } from "./authService";

export const slugify = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "") || "report";

/** Writes report tables as CSV files into the configured export directory. */
export class ExportService {
  constructor(
    private readonly auth: AuthService,
    private readonly config: Pick<AppConfig, "exportDir">
  ) {}

  fileNameFor(title: string, at = new Date()): string {
    return `${slugify(title)}_${format(at, "yyyyMMdd_HHmmss")}.csv`;
  }

  exportTable(table: ReportTable, at = new Date()): ExportResult {
    this.auth.requireRole("admin");
    const filePath = path.resolve(this.config.exportDir, this.fileNameFor(table.title, at));

    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, toCsv(table), "utf8");
    } catch (error) {
      throw new StorageError(`Could not write ${filePath}.`, error);
    }

    console.log(`[export] ${table.rows.length} record(s) written to ${filePath}`);
    return { filePath, recordsExported: table.rows.length };
  }
}
