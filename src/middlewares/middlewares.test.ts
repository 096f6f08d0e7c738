import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Action } from "../cli/context";
import {
  cliContext,
  createTestApp,
  FakePrompter,
  studentInput,
  type TestApp,
} from "../test/helpers";
import { AuthError, ForbiddenError, NotFoundError, ValidationError } from "../utils/errors";
import { protect } from "./auth";
import { errorHandler } from "./errorHandler";
import { restrictTo } from "./roles";

describe("protect", () => {
  let app: TestApp;
  const ran = vi.fn<Action>(async () => undefined);

  beforeEach(async () => {
    app = await createTestApp();
    ran.mockClear();
  });

  afterEach(() => app.handle.close());

  it("runs the action for a logged-in user", async () => {
    await protect(ran)(cliContext(app, new FakePrompter()));
    expect(ran).toHaveBeenCalledTimes(1);
  });

  it("refuses without a session", async () => {
    app.services.auth.logout();
    await expect(protect(ran)(cliContext(app, new FakePrompter()))).rejects.toMatchObject({
      reason: "NotAuthenticated",
    });
    expect(ran).not.toHaveBeenCalled();
  });

  it("ends the session of an account deactivated after login", async () => {
    const student = await app.services.students.addStudent(studentInput());
    app.services.auth.logout();
    await app.services.auth.login("ana.silva", "test-secret");
    app.handle.sqlite.run("UPDATE users SET is_active = 0 WHERE id = ?", [student.userId]);

    await expect(protect(ran)(cliContext(app, new FakePrompter()))).rejects.toThrow(
      "User account is not active."
    );
    expect(app.services.auth.isLoggedIn()).toBe(false);
  });
});

describe("restrictTo", () => {
  it("lets listed roles through and stops the rest", async () => {
    const app = await createTestApp();
    const ran = vi.fn<Action>(async () => undefined);
    const ctx = cliContext(app, new FakePrompter());

    await restrictTo("admin")(ran)(ctx);
    await expect(restrictTo("faculty", "student")(ran)(ctx)).rejects.toThrow(ForbiddenError);
    app.services.auth.logout();
    await expect(restrictTo("admin")(ran)(ctx)).rejects.toThrow(AuthError);

    expect(ran).toHaveBeenCalledTimes(1);
    app.handle.close();
  });
});

describe("errorHandler", () => {
  it("lists validation details under the summary", () => {
    const io = new FakePrompter();
    errorHandler(
      new ValidationError("Invalid course data: Credits must be a positive whole number", [
        "Credits must be a positive whole number",
      ]),
      io
    );
    expect(io.lines).toEqual([
      "\nError: Invalid course data",
      "  - Credits must be a positive whole number",
    ]);
  });

  it("prints known errors as they are", () => {
    const io = new FakePrompter();
    errorHandler(new NotFoundError("Class", 9), io);
    errorHandler(new ValidationError("Grade is required."), io);
    expect(io.lines).toEqual(["\nError: Class 9 not found.", "\nError: Grade is required."]);
  });

  it("logs unexpected errors and shows a generic message", () => {
    const logged = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const io = new FakePrompter();
    const failure = new TypeError("boom");

    errorHandler(failure, io);

    expect(logged).toHaveBeenCalledWith("Unhandled error:", failure);
    expect(io.lines).toEqual(["\nError: Something went wrong. See the log for details."]);
    logged.mockRestore();
  });
});
