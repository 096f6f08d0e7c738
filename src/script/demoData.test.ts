import fs from "fs";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestApp, type TestApp } from "../test/helpers";
import { ValidationError } from "../utils/errors";
import { parseDemoData, seedDemoData, type DemoData } from "./demoData";

const readDemoFile = (): unknown =>
  JSON.parse(fs.readFileSync(path.resolve(__dirname, "../../data/demo-data.json"), "utf8"));

const emptyData = (): DemoData => ({
  password: "test-secret",
  courses: [],
  faculty: [],
  students: [],
  classes: [],
  enrollments: [],
});

describe("parseDemoData", () => {
  it("accepts the bundled demo file", () => {
    const data = parseDemoData(readDemoFile());
    expect(data.courses).toHaveLength(8);
    expect(data.classes[0]).toMatchObject({ classCode: "CS110-A", employeeId: "EMP-101" });
  });

  it("names the first malformed entry", () => {
    expect(() => parseDemoData(null)).toThrow(ValidationError);
    expect(() =>
      parseDemoData({ ...emptyData(), courses: [{ code: "CS1", title: "T", credits: "3" }] })
    ).toThrow("Demo data: courses[0] is malformed.");
    expect(() => parseDemoData({ ...emptyData(), students: "none" })).toThrow(
      'Demo data: "students" must be a list.'
    );
  });
});

describe("seedDemoData", () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(() => app.handle.close());

  it("creates every record through the services", async () => {
    const summary = await seedDemoData(app.services, parseDemoData(readDemoFile()));
    expect(summary).toEqual({ courses: 8, faculty: 6, students: 10, classes: 8, enrollments: 16 });

    const dashboard = app.services.reports.getDashboardSummary();
    expect(dashboard.totalEnrollment).toBe(16);
    expect(dashboard.totalDepartments).toBe(5);

    app.services.auth.logout();
    const session = await app.services.auth.login("mreyes", "demo-pass");
    expect(session.role).toBe("faculty");
    expect(app.services.classes.getMyClasses().map((row) => row.classCode)).toEqual([
      "CS110-A",
      "CS110-B",
    ]);
  });

  it("stops on a reference to an unknown course", async () => {
    const data: DemoData = {
      ...emptyData(),
      classes: [
        {
          classCode: "X-1",
          courseCode: "NOPE",
          employeeId: "EMP-1",
          semester: "Fall",
          academicYear: "2024",
          schedule: "MWF 09:00-10:00",
          room: "A-1",
          capacity: 10,
        },
      ],
    };
    await expect(seedDemoData(app.services, data)).rejects.toThrow('Demo data: unknown course "NOPE".');
  });
});
