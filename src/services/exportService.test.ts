import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AuthError, ForbiddenError } from "../utils/errors";
import { createTestApp, studentInput, type TestApp } from "../test/helpers";
import { slugify } from "./exportService";

describe("slugify", () => {
  it("turns titles into file-safe names", () => {
    expect(slugify("Faculty Workload")).toBe("faculty_workload");
    expect(slugify("  Enrollment per Class (Fall) ")).toBe("enrollment_per_class_fall");
    expect(slugify("%%%")).toBe("report");
  });
});

describe("ExportService", () => {
  let app: TestApp;
  let exportDir: string;

  beforeEach(async () => {
    exportDir = fs.mkdtempSync(path.join(os.tmpdir(), "campus-export-"));
    app = await createTestApp({ config: { exportDir } });
  });

  afterEach(() => {
    app.handle.close();
    fs.rmSync(exportDir, { recursive: true, force: true });
  });

  it("writes a header line and one line per row", () => {
    const at = new Date(2024, 8, 2, 14, 5, 9);
    const result = app.services.exports.exportTable(
      {
        title: "Room Utilization",
        columns: ["Room", "Classes"],
        rows: [
          ["A-101", 2],
          ["Lab, West", 1],
        ],
      },
      at
    );

    expect(result).toEqual({
      filePath: path.join(exportDir, "room_utilization_20240902_140509.csv"),
      recordsExported: 2,
    });
    expect(fs.readFileSync(result.filePath, "utf8")).toBe(
      'Room,Classes\nA-101,2\n"Lab, West",1\n'
    );
  });

  it("exports live reports", () => {
    const table = app.services.reports.buildReport("dashboard");
    const result = app.services.exports.exportTable(table);
    const lines = fs.readFileSync(result.filePath, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(table.rows.length + 1);
    expect(lines[0]).toBe("Metric,Value");
    expect(lines[1]).toBe("Active Faculty,0");
  });

  it("writes the active flag as the console shows it", async () => {
    await app.services.students.addStudent(studentInput());
    const result = app.services.exports.exportTable(app.services.reports.buildReport("studentList"));

    const lines = fs.readFileSync(result.filePath, "utf8").trimEnd().split("\n");
    expect(lines[1]).toBe(
      "1,Ana Silva,STU-0001,Computer Science,1,555-301-0001,ana.silva@student.example,2024-08-26,yes"
    );
  });

  it("requires an administrator", async () => {
    const table = { title: "x", columns: ["a"], rows: [] };
    await app.services.students.addStudent(studentInput());
    app.services.auth.logout();
    expect(() => app.services.exports.exportTable(table)).toThrow(AuthError);

    await app.services.auth.login("ana.silva", "test-secret");
    expect(() => app.services.exports.exportTable(table)).toThrow(ForbiddenError);
    expect(fs.readdirSync(exportDir)).toEqual([]);
  });
});
