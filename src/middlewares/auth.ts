// src/middlewares/auth.ts
import type { Action } from "../cli/context";
import { AuthError } from "../utils/errors";

/**
 * Refuses to run `action` without a logged-in user, and re-checks that the
 * account was not deactivated since login.
 */
export const protect =
  (action: Action): Action =>
  async (ctx) => {
    const session = ctx.services.auth.getSession();
    if (!session) {
      throw new AuthError("NotAuthenticated");
    }
    const user = ctx.services.auth.findUserById(session.userId);
    if (!user || !user.isActive) {
      ctx.services.auth.logout();
      throw new AuthError("AccountInactive", "User account is not active.");
    }
    await action(ctx);
  };
