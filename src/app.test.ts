import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { APP_TITLE, menuForRole, runApp } from "./app";
import {
  cliContext,
  createTestApp,
  FakePrompter,
  seedClass,
  studentInput,
  type TestApp,
} from "./test/helpers";

describe("runApp", () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp({ login: false });
  });

  afterEach(() => app.handle.close());

  it("retries a failed login and logs out when the menu is left", async () => {
    const io = new FakePrompter(["2", "1", "admin", "wrong", "1", "admin", "admin123", "0", "0"]);
    await runApp(cliContext(app, io));

    expect(io.lines.slice(0, 3)).toEqual(["=".repeat(60), `  ${APP_TITLE}`, "=".repeat(60)]);
    expect(io.lines).toContain("Please enter 0 or 1.");
    expect(io.lines).toContain("\nError: Invalid username or password.");
    expect(io.lines).toContain("\nWelcome, admin!");
    expect(io.lines).toContain("Admin Dashboard");
    expect(io.lines[io.lines.length - 1]).toBe("\nGoodbye.");
    expect(app.services.auth.isLoggedIn()).toBe(false);
  });

  it("lets an admin add a course through the menus", async () => {
    const io = new FakePrompter([
      "1",
      "admin",
      "admin123",
      "3", // Course Management
      "1", // Add New Course
      "cs320",
      "Algorithm Design",
      "",
      "3",
      "Computer Science",
      "CS210, cs110",
    ]);
    await runApp(cliContext(app, io));

    expect(io.lines).toContain("\nCourse CS320 created with id 1.");
    await app.services.auth.login("admin", "admin123");
    expect(app.services.courses.getCourse(1)).toMatchObject({
      code: "CS320",
      description: "",
      credits: 3,
      prerequisites: ["CS210", "CS110"],
    });
  });

  it("opens the student menu for students", async () => {
    await app.services.auth.login("admin", "admin123");
    const { classRow } = await seedClass(app.services);
    const student = await app.services.students.addStudent(studentInput());
    app.services.enrollment.enroll(classRow.id, student.id);
    app.services.auth.logout();

    const io = new FakePrompter(["1", "ana.silva", "test-secret", "2"]);
    await runApp(cliContext(app, io));

    const at = io.lines.indexOf("My Enrollments");
    expect(at).toBeGreaterThan(-1);
    expect(io.lines[at + 4]).toBe(
      `${classRow.id}         CS110-A  Programming Fundamentals  Marta Reyes  2024 Fall  MWF 09:00-10:00  -      enrolled`
    );
  });
});

describe("menuForRole", () => {
  it("gives each role its own dashboard", () => {
    expect(menuForRole("admin").labels).toEqual([
      "Overview",
      "Faculty Management",
      "Course Management",
      "Class Management",
      "Student Management",
      "Enrollment & Attendance",
      "Reports & Analytics",
      "Accounts & Users",
    ]);
    expect(menuForRole("faculty").title).toBe("Faculty Dashboard");
    expect(menuForRole("student").labels).toEqual([
      "My Profile",
      "My Enrollments",
      "Available Classes",
      "My Attendance",
      "Change Password",
    ]);
  });
});
