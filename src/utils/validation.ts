// src/utils/validation.ts
import { isMatch } from "date-fns";
import { ValidationError } from "./errors";

const PHONE_NOISE = /[\s\-()]/g;

export const isValidEmail = (email: string): boolean => {
  const at = email.indexOf("@");
  if (at <= 0) return false;
  return email.slice(at + 1).includes(".");
};

export const isValidPhone = (phone: string): boolean => {
  const digits = phone.replace(PHONE_NOISE, "");
  return /^\d+$/.test(digits) && digits.length >= 10;
};

export const isIsoDate = (value: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) && isMatch(value, "yyyy-MM-dd");

/**
 * Collects every problem with a payload so the user sees them all at once.
 *
 * ```ts
 * const checks = new FieldChecks();
 * checks.required("First name", input.firstName).email("Email", input.email);
 * checks.assertValid("Invalid faculty data");
 * ```
 */
export class FieldChecks {
  private readonly errors: string[] = [];

  get problems(): readonly string[] {
    return this.errors;
  }

  add(message: string): this {
    this.errors.push(message);
    return this;
  }

  required(label: string, value: string | undefined | null): this {
    if (value === undefined || value === null || value.trim() === "") {
      this.errors.push(`${label} is required`);
    }
    return this;
  }

  email(label: string, value: string | undefined): this {
    if (value && !isValidEmail(value)) this.errors.push(`${label} is not a valid email address`);
    return this;
  }

  phone(label: string, value: string | undefined): this {
    if (value && !isValidPhone(value)) this.errors.push(`${label} must be at least 10 digits`);
    return this;
  }

  nonNegative(label: string, value: number | undefined): this {
    if (value === undefined) return this;
    if (!Number.isFinite(value)) this.errors.push(`${label} must be a valid number`);
    else if (value < 0) this.errors.push(`${label} must not be negative`);
    return this;
  }

  positiveInteger(label: string, value: number | undefined): this {
    if (value === undefined) return this;
    if (!Number.isInteger(value) || value <= 0) {
      this.errors.push(`${label} must be a positive whole number`);
    }
    return this;
  }

  integerBetween(label: string, value: number | undefined, min: number, max: number): this {
    if (value === undefined) return this;
    if (!Number.isInteger(value) || value < min || value > max) {
      this.errors.push(`${label} must be between ${min} and ${max}`);
    }
    return this;
  }

  year(label: string, value: string | undefined): this {
    if (value && !/^\d{4}$/.test(value)) this.errors.push(`${label} must be a 4-digit year`);
    return this;
  }

  date(label: string, value: string | undefined): this {
    if (value && !isIsoDate(value)) this.errors.push(`${label} must be a date in YYYY-MM-DD format`);
    return this;
  }

  minLength(label: string, value: string | undefined, length: number): this {
    if (value !== undefined && value.length < length) {
      this.errors.push(`${label} must be at least ${length} characters`);
    }
    return this;
  }

  oneOf<T extends string>(label: string, value: string | undefined, allowed: readonly T[]): this {
    if (value !== undefined && !allowed.some((option) => option === value)) {
      this.errors.push(`${label} must be one of: ${allowed.join(", ")}`);
    }
    return this;
  }

  assertValid(message: string): void {
    if (this.errors.length > 0) {
      throw new ValidationError(`${message}: ${this.errors.join("; ")}`, [...this.errors]);
    }
  }
}

/** Narrows a raw string to one of the allowed literals. */
export const isOneOf = <T extends string>(
  value: string,
  allowed: readonly T[]
): value is T => allowed.some((option) => option === value);
