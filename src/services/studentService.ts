// src/services/studentService.ts
import { and, asc, desc, eq, ne, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { classes, courses, enrollments, faculty, students, users } from "../db/schema";
import type {
  AvailableClass,
  Enrollment,
  Student,
  StudentEnrollment,
  StudentInput,
  StudentUpdate,
} from "../types/models";
import { ForbiddenError, NotFoundError, ValidationError, translateDbError } from "../utils/errors";
import { fullName, hasChanges, includesIgnoreCase, today } from "../utils/helpers";
import { FieldChecks } from "../utils/validation";
import type { AuthService } from "./authService";
import { BaseService, type ServiceConfig } from "./baseService";
import type { EnrollmentService } from "./enrollmentService";

export const MIN_YEAR_LEVEL = 1;
export const MAX_YEAR_LEVEL = 4;

export class StudentService extends BaseService {
  constructor(
    db: AppDatabase,
    auth: AuthService,
    config: ServiceConfig,
    private readonly enrollment: EnrollmentService
  ) {
    super(db, auth, config);
  }

  validateStudent(input: StudentUpdate, checks = new FieldChecks()): FieldChecks {
    const textFields: [string, string | undefined][] = [
      ["First name", input.firstName],
      ["Last name", input.lastName],
      ["Student ID", input.studentNumber],
      ["Major", input.major],
      ["Phone", input.phone],
      ["Email", input.email],
    ];
    for (const [label, value] of textFields) {
      if (value !== undefined) checks.required(label, value);
    }
    return checks
      .integerBetween("Year level", input.yearLevel, MIN_YEAR_LEVEL, MAX_YEAR_LEVEL)
      .email("Email", input.email)
      .phone("Phone", input.phone);
  }

  /** Creates the login account and the student profile together. */
  async addStudent(input: StudentInput): Promise<Student> {
    this.requireRole("admin");
    const checks = this.auth.validateAccount(input);
    this.validateStudent(input, checks)
      .required("First name", input.firstName)
      .required("Last name", input.lastName)
      .required("Student ID", input.studentNumber)
      .required("Major", input.major)
      .required("Phone", input.phone)
      .date("Enrollment date", input.enrollmentDate)
      .assertValid("Invalid student data");

    const passwordHash = await this.auth.hashPassword(input.password);

    try {
      const created = this.db.transaction((tx) => {
        const user = this.auth.insertUser(
          tx,
          { username: input.username, email: input.email, passwordHash },
          "student"
        );
        return tx
          .insert(students)
          .values({
            userId: user.id,
            firstName: input.firstName.trim(),
            lastName: input.lastName.trim(),
            studentNumber: input.studentNumber.trim(),
            major: input.major.trim(),
            yearLevel: input.yearLevel,
            phone: input.phone.trim(),
            email: input.email.trim(),
            enrollmentDate: input.enrollmentDate ?? today(),
          })
          .returning()
          .get();
      });
      console.log(`[students] added ${fullName(created)} (${created.studentNumber})`);
      return created;
    } catch (error) {
      throw translateDbError(error, "student");
    }
  }

  listStudents(options: { includeInactive?: boolean } = {}): Student[] {
    this.requireRole("admin");
    const order = [asc(students.lastName), asc(students.firstName)];
    return options.includeInactive
      ? this.db.select().from(students).orderBy(...order).all()
      : this.db
          .select()
          .from(students)
          .where(eq(students.isActive, true))
          .orderBy(...order)
          .all();
  }

  /** Admin sees anyone; a student only themself. */
  getStudent(id: number): Student {
    const session = this.requireRole("admin", "student");
    const student = this.getStudentRow(id);
    if (!student) throw new NotFoundError("Student", id);
    if (session.role === "student" && student.userId !== session.userId) {
      throw new ForbiddenError("You can only view your own student record.");
    }
    return student;
  }

  getMyStudentRecord(): Student {
    const session = this.requireRole("student");
    const student = this.sessionStudent(session);
    if (!student) throw new NotFoundError("Student profile for this account");
    return student;
  }

  searchStudents(term: string): Student[] {
    const needle = term.trim();
    if (!needle) throw new ValidationError("Search term cannot be empty.");
    return this.listStudents().filter(
      (student) =>
        includesIgnoreCase(student.firstName, needle) ||
        includesIgnoreCase(student.lastName, needle) ||
        includesIgnoreCase(student.studentNumber, needle) ||
        includesIgnoreCase(student.major, needle) ||
        includesIgnoreCase(student.email, needle)
    );
  }

  getStudentsByMajor(major: string): Student[] {
    const wanted = major.trim().toLowerCase();
    return this.listStudents().filter((student) => student.major.toLowerCase() === wanted);
  }

  getStudentsByYear(yearLevel: number): Student[] {
    new FieldChecks()
      .integerBetween("Year level", yearLevel, MIN_YEAR_LEVEL, MAX_YEAR_LEVEL)
      .assertValid("Invalid year level");
    return this.listStudents().filter((student) => student.yearLevel === yearLevel);
  }

  updateStudent(id: number, patch: StudentUpdate): Student {
    this.requireRole("admin");
    if (!hasChanges(patch)) throw new ValidationError("No data to update.");
    this.validateStudent(patch).assertValid("Invalid student data");

    const student = this.getStudentRow(id);
    if (!student) throw new NotFoundError("Student", id);
    const email = patch.email?.trim();

    try {
      return this.db.transaction((tx) => {
        if (email !== undefined && email !== student.email) {
          tx.update(users).set({ email }).where(eq(users.id, student.userId)).run();
        }
        const updated = tx
          .update(students)
          .set({
            firstName: patch.firstName?.trim(),
            lastName: patch.lastName?.trim(),
            studentNumber: patch.studentNumber?.trim(),
            major: patch.major?.trim(),
            yearLevel: patch.yearLevel,
            phone: patch.phone?.trim(),
            email,
          })
          .where(eq(students.id, id))
          .returning()
          .get();
        if (!updated) throw new NotFoundError("Student", id);
        return updated;
      });
    } catch (error) {
      throw translateDbError(error, "student");
    }
  }

  /** Enrollment history is kept; the student simply can no longer log in or enroll. */
  deactivateStudent(id: number): void {
    this.setActive(id, false);
  }

  reactivateStudent(id: number): void {
    this.setActive(id, true);
  }

  private setActive(id: number, isActive: boolean): void {
    this.requireRole("admin");
    const student = this.getStudentRow(id);
    if (!student) throw new NotFoundError("Student", id);

    this.db.transaction((tx) => {
      tx.update(students).set({ isActive }).where(eq(students.id, id)).run();
      tx.update(users).set({ isActive }).where(eq(users.id, student.userId)).run();
    });
    console.log(`[students] ${isActive ? "reactivated" : "deactivated"} ${fullName(student)}`);
  }

  /** Every enrollment that was not dropped, newest term first. */
  getStudentEnrollments(studentId: number): StudentEnrollment[] {
    this.getStudent(studentId);
    return this.db
      .select({
        enrollmentId: enrollments.id,
        classId: classes.id,
        classCode: classes.classCode,
        courseTitle: courses.title,
        facultyName: sql<string>`${faculty.firstName} || ' ' || ${faculty.lastName}`,
        semester: classes.semester,
        academicYear: classes.academicYear,
        schedule: classes.schedule,
        room: classes.room,
        enrolledAt: enrollments.enrolledAt,
        grade: enrollments.grade,
        status: enrollments.status,
      })
      .from(enrollments)
      .innerJoin(classes, eq(enrollments.classId, classes.id))
      .innerJoin(courses, eq(classes.courseId, courses.id))
      .innerJoin(faculty, eq(classes.facultyId, faculty.id))
      .where(and(eq(enrollments.studentId, studentId), ne(enrollments.status, "dropped")))
      .orderBy(desc(classes.academicYear), asc(classes.classCode))
      .all();
  }

  /** Active classes with a free seat that the student is not already in. */
  getAvailableClasses(studentId: number): AvailableClass[] {
    const taken = new Set(
      this.getStudentEnrollments(studentId).map((enrollment) => enrollment.classId)
    );
    return this.listClassDetails()
      .filter(
        (row) => row.status === "active" && row.enrolledCount < row.capacity && !taken.has(row.id)
      )
      .map((row) => ({
        classId: row.id,
        classCode: row.classCode,
        courseTitle: row.courseTitle,
        facultyName: row.facultyName,
        semester: row.semester,
        academicYear: row.academicYear,
        schedule: row.schedule,
        room: row.room,
        availableSeats: row.capacity - row.enrolledCount,
      }));
  }

  enrollStudentInClass(studentId: number, classId: number): Enrollment {
    return this.enrollment.enroll(classId, studentId);
  }

  dropStudentFromClass(studentId: number, classId: number): void {
    this.enrollment.drop(classId, studentId);
  }
}
