import initSqlJs from "sql.js";
import { describe, expect, it } from "vitest";
import {
  AuthError,
  CapacityExceeded,
  DuplicateError,
  IntegrityError,
  NotFoundError,
  StorageError,
  ValidationError,
  translateDbError,
} from "./errors";

const constraintFailure = async (statement: string): Promise<unknown> => {
  const SQL = await initSqlJs();
  const sqlite = new SQL.Database();
  sqlite.run("PRAGMA foreign_keys = ON");
  sqlite.exec(`
    CREATE TABLE parent (id INTEGER PRIMARY KEY, code TEXT NOT NULL UNIQUE);
    CREATE TABLE child (id INTEGER PRIMARY KEY, parent_id INTEGER NOT NULL REFERENCES parent (id),
      size INTEGER NOT NULL CHECK (size > 0));
    INSERT INTO parent (id, code) VALUES (1, 'A');
  `);
  try {
    sqlite.exec(statement);
    return undefined;
  } catch (error) {
    return error;
  } finally {
    sqlite.close();
  }
};

describe("error classes", () => {
  it("carry a code and an HTTP-style status", () => {
    expect(new ValidationError("bad").status).toBe(400);
    expect(new AuthError("NotAuthenticated").status).toBe(401);
    expect(new NotFoundError("Class", 7).status).toBe(404);
    expect(new CapacityExceeded("CS110-A", 2).code).toBe("CAPACITY_EXCEEDED");
    expect(new StorageError("disk").status).toBe(500);
  });

  it("build readable messages", () => {
    expect(new NotFoundError("Class", 7).message).toBe("Class 7 not found.");
    expect(new NotFoundError("Student profile").message).toBe("Student profile not found.");
    expect(new AuthError("AccountInactive").message).toBe("This account has been deactivated.");
    expect(new CapacityExceeded("CS110-A", 2).message).toBe("Class CS110-A is full (capacity 2).");
  });

  it("keep the subclass name", () => {
    expect(new DuplicateError("x").name).toBe("DuplicateError");
  });
});

describe("translateDbError", () => {
  it("turns a unique violation into a DuplicateError naming the column", async () => {
    const error = translateDbError(
      await constraintFailure("INSERT INTO parent (code) VALUES ('A')"),
      "course"
    );
    expect(error).toBeInstanceOf(DuplicateError);
    expect(error.message).toBe("A course with this code already exists.");
  });

  it("turns a missing reference into an IntegrityError", async () => {
    const error = translateDbError(
      await constraintFailure("INSERT INTO child (parent_id, size) VALUES (99, 1)"),
      "class"
    );
    expect(error).toBeInstanceOf(IntegrityError);
  });

  it("turns a failed check into a ValidationError", async () => {
    const error = translateDbError(
      await constraintFailure("INSERT INTO child (parent_id, size) VALUES (1, 0)"),
      "class"
    );
    expect(error).toBeInstanceOf(ValidationError);
  });

  it("finds the failure on a wrapped cause", async () => {
    const wrapped = new Error("Failed query", {
      cause: await constraintFailure("INSERT INTO child (parent_id) VALUES (1)"),
    });
    const error = translateDbError(wrapped, "class");
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ details: ["NOT NULL constraint failed: child.size"] });
  });

  it("passes application errors through", () => {
    const original = new NotFoundError("Course", 3);
    expect(translateDbError(original, "course")).toBe(original);
  });
});
