// src/utils/errors.ts

/**
 * Base class for every failure the application knows how to report.
 * `status` mirrors the HTTP code the same failure would carry on an API.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public readonly details: string[] = []) {
    super(message, "VALIDATION_ERROR", 400);
  }
}

export type AuthFailureReason =
  | "InvalidCredentials"
  | "AccountInactive"
  | "NotAuthenticated";

export class AuthError extends AppError {
  constructor(public readonly reason: AuthFailureReason, message?: string) {
    super(message ?? AuthError.defaultMessage(reason), "AUTH_ERROR", 401);
  }

  private static defaultMessage(reason: AuthFailureReason): string {
    switch (reason) {
      case "InvalidCredentials":
        return "Invalid username or password.";
      case "AccountInactive":
        return "This account has been deactivated.";
      case "NotAuthenticated":
        return "You must be logged in to do that.";
    }
  }
}

export class ForbiddenError extends AppError {
  constructor(
    message = "You do not have permission to perform this action."
  ) {
    super(message, "FORBIDDEN", 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: number | string) {
    super(
      id === undefined ? `${entity} not found.` : `${entity} ${id} not found.`,
      "NOT_FOUND",
      404
    );
  }
}

export class DuplicateError extends AppError {
  constructor(message: string) {
    super(message, "DUPLICATE", 409);
  }
}

export class CapacityExceeded extends AppError {
  constructor(
    public readonly classCode: string,
    public readonly capacity: number
  ) {
    super(
      `Class ${classCode} is full (capacity ${capacity}).`,
      "CAPACITY_EXCEEDED",
      409
    );
  }
}

export class IntegrityError extends AppError {
  constructor(message: string) {
    super(message, "INTEGRITY_ERROR", 409);
  }
}

export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORAGE_ERROR", 500);
    this.cause = cause;
  }
}

const CONSTRAINT_FAILURE = /(UNIQUE|PRIMARY KEY|FOREIGN KEY|CHECK|NOT NULL) constraint failed/;

interface ConstraintFailure {
  kind: string;
  message: string;
}

/** SQLite reports constraint failures by message; wrappers keep it on `cause`. */
const findConstraintFailure = (error: unknown): ConstraintFailure | null => {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const match = CONSTRAINT_FAILURE.exec(current.message);
    if (match) return { kind: match[1], message: current.message };
    current = current.cause;
  }
  return null;
};

/**
 * Translates driver constraint failures into the application's taxonomy.
 * AppErrors pass through untouched.
 */
export const translateDbError = (error: unknown, entity: string): Error => {
  if (error instanceof AppError) return error;

  const failure = findConstraintFailure(error);
  if (failure) {
    switch (failure.kind) {
      case "UNIQUE":
      case "PRIMARY KEY": {
        const column = failure.message.split(".").pop() ?? "value";
        return new DuplicateError(`A ${entity} with this ${column} already exists.`);
      }
      case "FOREIGN KEY":
        return new IntegrityError(`The ${entity} references a record that does not exist.`);
      default:
        return new ValidationError(`Invalid ${entity} data.`, [failure.message]);
    }
  }

  return error instanceof Error ? error : new StorageError(String(error));
};
