// src/services/authService.ts
import bcrypt from "bcryptjs";
import { eq } from "drizzle-orm";
import type { AppDatabase, DbExecutor } from "../db";
import { faculty, students, users, USER_ROLES } from "../db/schema";
import type { AppConfig } from "../config";
import type { AccountInput, Session, User, UserProfile, UserRole } from "../types/models";
import { assertRole } from "../middlewares/roles";
import {
  AuthError,
  DuplicateError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
  translateDbError,
} from "../utils/errors";
import { FieldChecks } from "../utils/validation";

export const MIN_PASSWORD_LENGTH = 6;

const toUser = ({ passwordHash: _, ...user }: typeof users.$inferSelect): User => user;

/**
 * Owns the users table and the in-memory session of the person at the console.
 */
export class AuthService {
  private session: Session | null = null;

  constructor(
    private readonly db: AppDatabase,
    private readonly config: Pick<AppConfig, "saltRounds" | "defaultAdmin">
  ) {}

  // --- Session ---

  async login(username: string, password: string): Promise<Session> {
    if (!username || !password) {
      throw new ValidationError("Username and password are required.");
    }

    const user = this.db.select().from(users).where(eq(users.username, username)).get();
    if (!user) {
      throw new AuthError("InvalidCredentials");
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid) {
      throw new AuthError("InvalidCredentials");
    }
    if (!user.isActive) {
      throw new AuthError("AccountInactive");
    }

    this.session = {
      userId: user.id,
      username: user.username,
      role: user.role,
      loggedInAt: new Date(),
    };
    console.log(`[auth] ${user.username} logged in as ${user.role}`);
    return this.session;
  }

  logout(): void {
    if (this.session) {
      console.log(`[auth] ${this.session.username} logged out`);
    }
    this.session = null;
  }

  getSession(): Session | null {
    return this.session;
  }

  isLoggedIn(): boolean {
    return this.session !== null;
  }

  /** Admin holds every permission; anyone else only their own role's. */
  hasPermission(role: UserRole): boolean {
    if (!this.session) return false;
    return this.session.role === "admin" || this.session.role === role;
  }

  requireSession(): Session {
    if (!this.session) throw new AuthError("NotAuthenticated");
    return this.session;
  }

  requireRole(...roles: UserRole[]): Session {
    return assertRole(this.session, roles);
  }

  // --- Accounts ---

  findUserById(userId: number): User | null {
    const user = this.db.select().from(users).where(eq(users.id, userId)).get();
    return user ? toUser(user) : null;
  }

  listUsers(role?: UserRole): User[] {
    this.requireRole("admin");
    const query = this.db.select().from(users);
    const rows = role ? query.where(eq(users.role, role)).all() : query.all();
    return rows.map(toUser);
  }

  validateAccount(input: AccountInput, checks = new FieldChecks()): FieldChecks {
    return checks
      .required("Username", input.username)
      .required("Email", input.email)
      .email("Email", input.email)
      .required("Password", input.password)
      .minLength("Password", input.password, MIN_PASSWORD_LENGTH);
  }

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.config.saltRounds);
  }

  /**
   * Inserts a user row. Callers creating a profile alongside it should hash
   * first and use {@link insertUser} inside their transaction instead.
   */
  async createUser(input: AccountInput, role: UserRole): Promise<User> {
    this.requireRole("admin");
    const checks = this.validateAccount(input).oneOf("Role", role, USER_ROLES);
    checks.assertValid("Invalid account");

    const passwordHash = await this.hashPassword(input.password);
    return this.insertUser(this.db, { ...input, passwordHash }, role);
  }

  insertUser(
    db: DbExecutor,
    input: Omit<AccountInput, "password"> & { passwordHash: string },
    role: UserRole
  ): User {
    try {
      const created = db
        .insert(users)
        .values({
          username: input.username,
          email: input.email,
          passwordHash: input.passwordHash,
          role,
        })
        .returning()
        .get();
      return toUser(created);
    } catch (error) {
      throw translateDbError(error, "user");
    }
  }

  async changePassword(currentPassword: string, newPassword: string): Promise<void> {
    const session = this.requireSession();
    const user = this.db.select().from(users).where(eq(users.id, session.userId)).get();
    if (!user) {
      throw new NotFoundError("User", session.userId);
    }

    const isPasswordValid = await bcrypt.compare(currentPassword, user.passwordHash);
    if (!isPasswordValid) {
      throw new AuthError("InvalidCredentials", "Incorrect current password.");
    }

    const checks = new FieldChecks().minLength("New password", newPassword, MIN_PASSWORD_LENGTH);
    if (currentPassword === newPassword) {
      checks.add("New password must differ from the current password");
    }
    checks.assertValid("Password not changed");

    const passwordHash = await this.hashPassword(newPassword);
    this.db.update(users).set({ passwordHash }).where(eq(users.id, user.id)).run();
    console.log(`[auth] password changed for ${user.username}`);
  }

  async resetPassword(userId: number, newPassword: string): Promise<void> {
    this.requireRole("admin");
    new FieldChecks()
      .minLength("New password", newPassword, MIN_PASSWORD_LENGTH)
      .assertValid("Password not reset");

    const passwordHash = await this.hashPassword(newPassword);
    const updated = this.db
      .update(users)
      .set({ passwordHash })
      .where(eq(users.id, userId))
      .returning({ id: users.id })
      .get();
    if (!updated) {
      throw new NotFoundError("User", userId);
    }
  }

  deactivateUser(userId: number): void {
    const session = this.requireRole("admin");
    if (session.userId === userId) {
      throw new ForbiddenError("You cannot deactivate your own account.");
    }
    this.setUserActive(userId, false);
  }

  reactivateUser(userId: number): void {
    this.requireRole("admin");
    this.setUserActive(userId, true);
  }

  /** Keeps the linked faculty or student record in step with the account. */
  private setUserActive(userId: number, isActive: boolean): void {
    this.db.transaction((tx) => {
      const updated = tx
        .update(users)
        .set({ isActive })
        .where(eq(users.id, userId))
        .returning({ role: users.role })
        .get();
      if (!updated) {
        throw new NotFoundError("User", userId);
      }

      if (updated.role === "faculty") {
        tx.update(faculty).set({ isActive }).where(eq(faculty.userId, userId)).run();
      } else if (updated.role === "student") {
        tx.update(students).set({ isActive }).where(eq(students.userId, userId)).run();
      }
    });
    console.log(`[auth] user ${userId} ${isActive ? "reactivated" : "deactivated"}`);
  }

  /**
   * Creates the configured admin account when the database has no admin yet.
   * @returns Whether an account was created.
   */
  async ensureDefaultAdmin(): Promise<boolean> {
    const existingAdmin = this.db.select().from(users).where(eq(users.role, "admin")).get();
    if (existingAdmin) return false;

    const { username, password, email } = this.config.defaultAdmin;
    const taken = this.db.select().from(users).where(eq(users.username, username)).get();
    if (taken) {
      throw new DuplicateError(
        `Cannot create the default admin: username "${username}" is already in use.`
      );
    }

    const passwordHash = await this.hashPassword(password);
    this.insertUser(this.db, { username, email, passwordHash }, "admin");
    console.log(`[setup] default admin user created: username=${username}`);
    return true;
  }

  /** The session user together with the faculty or student record linked to it. */
  getProfile(): UserProfile {
    const session = this.requireSession();
    const user = this.findUserById(session.userId);
    if (!user) {
      throw new NotFoundError("User", session.userId);
    }

    const profile: UserProfile = { ...user };
    if (user.role === "faculty") {
      profile.faculty = this.db.select().from(faculty).where(eq(faculty.userId, user.id)).get();
    } else if (user.role === "student") {
      profile.student = this.db.select().from(students).where(eq(students.userId, user.id)).get();
    }
    return profile;
  }
}
