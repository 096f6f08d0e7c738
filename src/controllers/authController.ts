// src/controllers/authController.ts

import type { Action, CliContext } from "../cli/context";
import { askInteger, askOptional, askRequired, confirm } from "../cli/prompter";
import { printTable } from "../cli/table";
import type { Session, User } from "../types/models";
import { fullName, generatePassword } from "../utils/helpers";

const usersTable = (title: string, users: User[]) => ({
  title,
  columns: ["ID", "Username", "Email", "Role", "Created", "Active"],
  rows: users.map((user) => [
    user.id,
    user.username,
    user.email,
    user.role,
    user.createdAt,
    user.isActive,
  ]),
});

// --- CONTROLLER FUNCTIONS ---

export const login = async ({ io, services }: CliContext): Promise<Session> => {
  const username = await askRequired(io, "Username");
  const password = await askRequired(io, "Password");
  const session = await services.auth.login(username, password);
  io.print(`\nWelcome, ${session.username}!`);
  return session;
};

export const showProfile: Action = async ({ io, services }) => {
  const profile = services.auth.getProfile();
  io.print(`\nUsername: ${profile.username}`);
  io.print(`Email:    ${profile.email}`);
  io.print(`Role:     ${profile.role}`);
  io.print(`Since:    ${profile.createdAt}`);
  if (profile.faculty) {
    io.print(`Name:       ${fullName(profile.faculty)}`);
    io.print(`Employee:   ${profile.faculty.employeeId}`);
    io.print(`Department: ${profile.faculty.department}`);
    io.print(`Office:     ${profile.faculty.officeLocation}`);
  }
  if (profile.student) {
    io.print(`Name:       ${fullName(profile.student)}`);
    io.print(`Student ID: ${profile.student.studentNumber}`);
    io.print(`Major:      ${profile.student.major} (year ${profile.student.yearLevel})`);
  }
};

export const changePassword: Action = async ({ io, services }) => {
  const current = await askRequired(io, "Current password");
  const next = await askRequired(io, "New password");
  const repeated = await askRequired(io, "Repeat new password");
  if (next !== repeated) {
    io.print("\nThe new passwords do not match. Nothing was changed.");
    return;
  }
  await services.auth.changePassword(current, next);
  io.print("\nPassword changed.");
};

export const listUsers: Action = async ({ io, services }) => {
  printTable(io, usersTable("User Accounts", services.auth.listUsers()));
};

export const createAdmin: Action = async ({ io, services }) => {
  const username = await askRequired(io, "Username");
  const email = await askRequired(io, "Email");
  const password = await askRequired(io, "Password");
  const user = await services.auth.createUser({ username, email, password }, "admin");
  io.print(`\nAdmin account ${user.username} created (id ${user.id}).`);
};

export const resetPassword: Action = async ({ io, services }) => {
  const userId = await askInteger(io, "User ID");
  const chosen = await askOptional(io, "New password (blank to generate one)");
  const password = chosen ?? generatePassword();
  await services.auth.resetPassword(userId, password);
  io.print(`\nPassword reset for user ${userId}.`);
  if (!chosen) io.print(`Temporary password: ${password}`);
};

export const deactivateUser: Action = async ({ io, services }) => {
  const userId = await askInteger(io, "User ID");
  if (!(await confirm(io, `Deactivate user ${userId}?`))) return;
  services.auth.deactivateUser(userId);
  io.print(`\nUser ${userId} deactivated.`);
};

export const reactivateUser: Action = async ({ io, services }) => {
  const userId = await askInteger(io, "User ID");
  services.auth.reactivateUser(userId);
  io.print(`\nUser ${userId} reactivated.`);
};
