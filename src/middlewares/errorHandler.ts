// src/middlewares/errorHandler.ts
import type { Prompter } from "../cli/prompter";
import { AppError, ValidationError } from "../utils/errors";

/**
 * Renders a failed action for the user. Known failures become a message;
 * anything else is logged in full and reported generically.
 */
export function errorHandler(err: unknown, io: Prompter): void {
  if (err instanceof ValidationError && err.details.length > 0) {
    io.print(`\nError: ${err.message.split(":")[0]}`);
    for (const detail of err.details) io.print(`  - ${detail}`);
    return;
  }
  if (err instanceof AppError) {
    io.print(`\nError: ${err.message}`);
    return;
  }
  console.error("Unhandled error:", err);
  io.print("\nError: Something went wrong. See the log for details.");
}
