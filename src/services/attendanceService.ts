// src/services/attendanceService.ts
import { and, asc, desc, eq, inArray } from "drizzle-orm";
import { ATTENDANCE_STATUSES, attendance, classes, courses, enrollments, students } from "../db/schema";
import type {
  AttendanceEntry,
  AttendanceRecord,
  AttendanceSummaryRow,
  ClassAttendanceEntry,
  StudentAttendanceEntry,
} from "../types/models";
import { ForbiddenError, NotFoundError, ValidationError } from "../utils/errors";
import { fullName, percent } from "../utils/helpers";
import { FieldChecks } from "../utils/validation";
import { BaseService } from "./baseService";

export class AttendanceService extends BaseService {
  /**
   * Marks a whole session at once. A mark that already exists for the same
   * student and date is overwritten.
   */
  recordAttendance(classId: number, date: string, entries: AttendanceEntry[]): AttendanceRecord[] {
    const classRow = this.findClassOrThrow(classId);
    this.requireClassStaff(classRow);

    const checks = new FieldChecks().required("Date", date).date("Date", date);
    if (entries.length === 0) checks.add("At least one student must be marked");
    entries.forEach((entry, index) =>
      checks.oneOf(`Status of entry ${index + 1}`, entry.status, ATTENDANCE_STATUSES)
    );
    checks.assertValid("Invalid attendance");

    const recorded = this.db.transaction((tx) => {
      const enrolled = new Set(
        tx
          .select({ studentId: enrollments.studentId })
          .from(enrollments)
          .where(and(eq(enrollments.classId, classId), eq(enrollments.status, "enrolled")))
          .all()
          .map((row) => row.studentId)
      );
      const outsiders = entries.filter((entry) => !enrolled.has(entry.studentId));
      if (outsiders.length > 0) {
        const ids = outsiders.map((entry) => entry.studentId).join(", ");
        throw new ValidationError(`Not enrolled in ${classRow.classCode}: student ${ids}`);
      }

      return entries.map((entry) =>
        tx
          .insert(attendance)
          .values({
            classId,
            studentId: entry.studentId,
            date,
            status: entry.status,
            notes: entry.notes?.trim() || null,
          })
          .onConflictDoUpdate({
            target: [attendance.classId, attendance.studentId, attendance.date],
            set: { status: entry.status, notes: entry.notes?.trim() || null },
          })
          .returning()
          .get()
      );
    });

    console.log(
      `[attendance] ${recorded.length} mark(s) recorded for ${classRow.classCode} on ${date}`
    );
    return recorded;
  }

  getClassAttendance(classId: number, date?: string): ClassAttendanceEntry[] {
    this.requireClassStaff(this.findClassOrThrow(classId));
    new FieldChecks().date("Date", date).assertValid("Invalid date");

    const where = date
      ? and(eq(attendance.classId, classId), eq(attendance.date, date))
      : eq(attendance.classId, classId);

    return this.db
      .select({
        id: attendance.id,
        date: attendance.date,
        studentId: students.id,
        studentNumber: students.studentNumber,
        firstName: students.firstName,
        lastName: students.lastName,
        status: attendance.status,
        notes: attendance.notes,
      })
      .from(attendance)
      .innerJoin(students, eq(attendance.studentId, students.id))
      .where(where)
      .orderBy(desc(attendance.date), asc(students.lastName), asc(students.firstName))
      .all()
      .map(({ firstName, lastName, ...row }) => ({ ...row, name: fullName({ firstName, lastName }) }));
  }

  /** Faculty only see the marks from classes they teach. */
  getStudentAttendance(studentId: number): StudentAttendanceEntry[] {
    const session = this.requireRole("admin", "faculty", "student");
    const student = this.getStudentRow(studentId);
    if (!student) throw new NotFoundError("Student", studentId);
    if (session.role === "student" && student.userId !== session.userId) {
      throw new ForbiddenError("You can only view your own attendance.");
    }

    const conditions = [eq(attendance.studentId, studentId)];
    if (session.role === "faculty") {
      const member = this.sessionFaculty(session);
      const taught = member
        ? this.db
            .select({ id: classes.id })
            .from(classes)
            .where(eq(classes.facultyId, member.id))
            .all()
            .map((row) => row.id)
        : [];
      if (taught.length === 0) return [];
      conditions.push(inArray(attendance.classId, taught));
    }

    return this.db
      .select({
        id: attendance.id,
        date: attendance.date,
        classId: classes.id,
        classCode: classes.classCode,
        courseTitle: courses.title,
        status: attendance.status,
        notes: attendance.notes,
      })
      .from(attendance)
      .innerJoin(classes, eq(attendance.classId, classes.id))
      .innerJoin(courses, eq(classes.courseId, courses.id))
      .where(and(...conditions))
      .orderBy(desc(attendance.date), asc(classes.classCode))
      .all();
  }

  /** Late counts as attended. Students with no marks show a rate of 0. */
  getAttendanceSummary(classId: number): AttendanceSummaryRow[] {
    this.requireClassStaff(this.findClassOrThrow(classId));

    const roster = this.db
      .select({
        studentId: students.id,
        studentNumber: students.studentNumber,
        firstName: students.firstName,
        lastName: students.lastName,
      })
      .from(enrollments)
      .innerJoin(students, eq(enrollments.studentId, students.id))
      .where(and(eq(enrollments.classId, classId), inArray(enrollments.status, ["enrolled", "completed"])))
      .orderBy(asc(students.lastName), asc(students.firstName))
      .all();

    const marks = this.db
      .select({ studentId: attendance.studentId, status: attendance.status })
      .from(attendance)
      .where(eq(attendance.classId, classId))
      .all();

    return roster.map((student) => {
      const mine = marks.filter((mark) => mark.studentId === student.studentId);
      const present = mine.filter((mark) => mark.status === "present").length;
      const late = mine.filter((mark) => mark.status === "late").length;
      const absent = mine.filter((mark) => mark.status === "absent").length;
      return {
        studentId: student.studentId,
        studentNumber: student.studentNumber,
        name: fullName(student),
        present,
        late,
        absent,
        sessions: mine.length,
        attendanceRate: percent(present + late, mine.length),
      };
    });
  }
}
