// src/utils/helpers.ts
import { format } from "date-fns";
import type { CellValue } from "../types/models";

/** A random lowercase-alphanumeric temporary password. */
export const generatePassword = (length = 8): string => {
  let password = "";
  while (password.length < length) password += Math.random().toString(36).slice(2);
  return password.slice(0, length);
};

export const fullName = (person: { firstName: string; lastName: string }): string =>
  `${person.firstName} ${person.lastName}`;

export const round2 = (value: number): number => Math.round(value * 100) / 100;

/** `part / whole` as a percentage, 0 when `whole` is 0. */
export const percent = (part: number, whole: number): number =>
  whole > 0 ? round2((part / whole) * 100) : 0;

export const today = (): string => format(new Date(), "yyyy-MM-dd");

/** UTC "YYYY-MM-DD HH:MM:SS", the same shape SQLite's CURRENT_TIMESTAMP writes. */
export const sqlTimestamp = (date = new Date()): string =>
  date.toISOString().replace("T", " ").slice(0, 19);

export const includesIgnoreCase = (haystack: string, needle: string): boolean =>
  haystack.toLowerCase().includes(needle.toLowerCase());

/** True when at least one field of a partial update was supplied. */
export const hasChanges = (patch: object): boolean =>
  Object.values(patch).some((value) => value !== undefined);

/** How a report cell reads, on screen and in exported files alike. */
export const formatCell = (value: CellValue, empty = ""): string => {
  if (value === null) return empty;
  if (typeof value === "boolean") return value ? "yes" : "no";
  return String(value);
};
