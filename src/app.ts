// src/app.ts
import type { CliContext } from "./cli/context";
import type { MenuRouter } from "./cli/menu";
import { login } from "./controllers/authController";
import { errorHandler } from "./middlewares/errorHandler";
import { adminRoutes } from "./routes/admin";
import { facultyRoutes } from "./routes/faculty";
import { studentRoutes } from "./routes/student";
import type { UserRole } from "./types/models";

export const APP_TITLE = "Campus Records - Faculty & Class Management";

export const menuForRole = (role: UserRole): MenuRouter => {
  switch (role) {
    case "admin":
      return adminRoutes();
    case "faculty":
      return facultyRoutes();
    case "student":
      return studentRoutes();
  }
};

/**
 * The login loop. Each successful login opens the menu for the user's role;
 * leaving that menu logs out and returns here.
 */
export const runApp = async (ctx: CliContext): Promise<void> => {
  const { io, services } = ctx;
  io.print("=".repeat(60));
  io.print(`  ${APP_TITLE}`);
  io.print("=".repeat(60));

  for (;;) {
    io.print("\n1. Login");
    io.print("0. Exit");
    const choice = await io.ask("\nEnter your choice (0-1): ");
    if (choice === "0") break;
    if (choice !== "1") {
      io.print("Please enter 0 or 1.");
      continue;
    }

    let role: UserRole;
    try {
      role = (await login(ctx)).role;
    } catch (err) {
      errorHandler(err, io);
      continue;
    }

    await menuForRole(role).run(ctx);
    services.auth.logout();
  }

  io.print("\nGoodbye.");
};
