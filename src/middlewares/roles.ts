// src/middlewares/roles.ts
import type { Action } from "../cli/context";
import type { Session, UserRole } from "../types/models";
import { AuthError, ForbiddenError } from "../utils/errors";

/**
 * Throws unless `session` belongs to one of `allowedRoles`.
 * @returns The same session, narrowed to non-null.
 */
export const assertRole = (
  session: Session | null,
  allowedRoles: readonly UserRole[]
): Session => {
  if (!session) {
    throw new AuthError("NotAuthenticated");
  }
  if (!allowedRoles.includes(session.role)) {
    throw new ForbiddenError(
      "Forbidden. You do not have permission to perform this action."
    );
  }
  return session;
};

/**
 * Wraps a menu action so it only runs for the given roles.
 * @param allowedRoles - The roles permitted to run the action.
 */
export const restrictTo =
  (...allowedRoles: UserRole[]) =>
  (action: Action): Action =>
  async (ctx) => {
    assertRole(ctx.services.auth.getSession(), allowedRoles);
    await action(ctx);
  };
