/**
 * @file src/services/baseService.ts
 * @description Base class with the lookups and guards every domain service shares.
 */
import { asc, desc, eq, getTableColumns, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { classes, courses, faculty, students } from "../db/schema";
import type { AppConfig } from "../config";
import type {
  ClassDetails,
  Faculty,
  FacultyWorkload,
  SchoolClass,
  Session,
  UserRole,
} from "../types/models";
import { ForbiddenError, NotFoundError } from "../utils/errors";
import { fullName, round2 } from "../utils/helpers";
import { weeklyHours } from "../utils/schedule";
import type { AuthService } from "./authService";

export type ServiceConfig = Pick<AppConfig, "roomHoursPerWeek" | "defaultClassHours">;

export abstract class BaseService {
  constructor(
    protected readonly db: AppDatabase,
    protected readonly auth: AuthService,
    protected readonly config: ServiceConfig
  ) {}

  protected requireRole(...roles: UserRole[]): Session {
    return this.auth.requireRole(...roles);
  }

  // --- Core Data Accessors (Protected) ---
  protected getFacultyRow = (id: number) =>
    this.db.select().from(faculty).where(eq(faculty.id, id)).get();
  protected getStudentRow = (id: number) =>
    this.db.select().from(students).where(eq(students.id, id)).get();
  protected getCourseRow = (id: number) =>
    this.db.select().from(courses).where(eq(courses.id, id)).get();
  protected getClassRow = (id: number) =>
    this.db.select().from(classes).where(eq(classes.id, id)).get();

  protected findClassOrThrow(id: number) {
    const row = this.getClassRow(id);
    if (!row) throw new NotFoundError("Class", id);
    return row;
  }

  /** Classes joined with course and faculty names, newest academic year first. */
  protected classDetailsQuery() {
    return this.db
      .select({
        ...getTableColumns(classes),
        courseCode: courses.code,
        courseTitle: courses.title,
        facultyName: sql<string>`${faculty.firstName} || ' ' || ${faculty.lastName}`,
      })
      .from(classes)
      .innerJoin(courses, eq(classes.courseId, courses.id))
      .innerJoin(faculty, eq(classes.facultyId, faculty.id))
      .orderBy(desc(classes.academicYear), asc(classes.semester), asc(classes.classCode))
      .$dynamic();
  }

  protected listClassDetails(): ClassDetails[] {
    return this.classDetailsQuery().all();
  }

  protected getClassDetails(id: number): ClassDetails {
    const row = this.classDetailsQuery().where(eq(classes.id, id)).get();
    if (!row) throw new NotFoundError("Class", id);
    return row;
  }

  /** The faculty record linked to the session user, if the session is a faculty member. */
  protected sessionFaculty(session: Session) {
    if (session.role !== "faculty") return undefined;
    return this.db.select().from(faculty).where(eq(faculty.userId, session.userId)).get();
  }

  protected sessionStudent(session: Session) {
    if (session.role !== "student") return undefined;
    return this.db.select().from(students).where(eq(students.userId, session.userId)).get();
  }

  /**
   * Admins pass; faculty pass only for classes they teach.
   * @returns The session that was checked.
   */
  protected requireClassStaff(classRow: { id: number; facultyId: number }): Session {
    const session = this.requireRole("admin", "faculty");
    if (session.role === "faculty" && this.sessionFaculty(session)?.id !== classRow.facultyId) {
      throw new ForbiddenError("You can only manage classes you teach.");
    }
    return session;
  }

  /** Totals over the classes passed in; callers pass only the member's active classes. */
  protected buildWorkload(member: Faculty, taught: SchoolClass[]): FacultyWorkload {
    const totalStudents = taught.reduce((sum, row) => sum + row.enrolledCount, 0);
    const hours = taught.reduce(
      (sum, row) => sum + weeklyHours(row.schedule, this.config.defaultClassHours),
      0
    );
    return {
      facultyId: member.id,
      name: fullName(member),
      employeeId: member.employeeId,
      department: member.department,
      totalClasses: taught.length,
      totalStudents,
      averageClassSize: taught.length > 0 ? round2(totalStudents / taught.length) : 0,
      weeklyHours: round2(hours),
    };
  }
}
