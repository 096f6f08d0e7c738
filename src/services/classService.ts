// src/services/classService.ts
import { and, eq, ne } from "drizzle-orm";
import { attendance, classes, enrollments, students, CLASS_STATUSES } from "../db/schema";
import type {
  ClassDetails,
  ClassInput,
  ClassStatus,
  ClassUpdate,
  RosterEntry,
  SchoolClass,
} from "../types/models";
import {
  IntegrityError,
  NotFoundError,
  ValidationError,
  translateDbError,
} from "../utils/errors";
import { fullName, hasChanges, includesIgnoreCase } from "../utils/helpers";
import { FieldChecks } from "../utils/validation";
import { BaseService } from "./baseService";

export class ClassService extends BaseService {
  validateClass(input: ClassUpdate, checks = new FieldChecks()): FieldChecks {
    const textFields: [string, string | undefined][] = [
      ["Class code", input.classCode],
      ["Semester", input.semester],
      ["Academic year", input.academicYear],
      ["Schedule", input.schedule],
      ["Room", input.room],
    ];
    for (const [label, value] of textFields) {
      if (value !== undefined) checks.required(label, value);
    }
    return checks
      .positiveInteger("Capacity", input.capacity)
      .year("Academic year", input.academicYear?.trim());
  }

  /** The course must exist and the faculty member must exist and be active. */
  private assertReferences(courseId: number | undefined, facultyId: number | undefined): void {
    if (courseId !== undefined && !this.getCourseRow(courseId)) {
      throw new IntegrityError(`Course ${courseId} does not exist.`);
    }
    if (facultyId !== undefined) {
      const member = this.getFacultyRow(facultyId);
      if (!member) throw new IntegrityError(`Faculty member ${facultyId} does not exist.`);
      if (!member.isActive) {
        throw new IntegrityError(`Faculty member ${fullName(member)} is not active.`);
      }
    }
  }

  addClass(input: ClassInput): ClassDetails {
    this.requireRole("admin");
    this.validateClass(input)
      .required("Class code", input.classCode)
      .required("Semester", input.semester)
      .required("Academic year", input.academicYear)
      .required("Schedule", input.schedule)
      .required("Room", input.room)
      .positiveInteger("Capacity", input.capacity)
      .assertValid("Invalid class data");
    this.assertReferences(input.courseId, input.facultyId);

    try {
      const created = this.db
        .insert(classes)
        .values({
          classCode: input.classCode.trim().toUpperCase(),
          courseId: input.courseId,
          facultyId: input.facultyId,
          semester: input.semester.trim(),
          academicYear: input.academicYear.trim(),
          schedule: input.schedule.trim(),
          room: input.room.trim(),
          capacity: input.capacity,
        })
        .returning()
        .get();
      console.log(`[classes] created ${created.classCode}`);
      return this.getClassDetails(created.id);
    } catch (error) {
      throw translateDbError(error, "class");
    }
  }

  listClasses(): ClassDetails[] {
    this.auth.requireSession();
    return this.listClassDetails();
  }

  getClass(id: number): ClassDetails {
    this.auth.requireSession();
    return this.getClassDetails(id);
  }

  searchClasses(term: string): ClassDetails[] {
    const needle = term.trim();
    if (!needle) throw new ValidationError("Search term cannot be empty.");
    return this.listClasses().filter(
      (row) =>
        includesIgnoreCase(row.classCode, needle) ||
        includesIgnoreCase(row.courseTitle, needle) ||
        includesIgnoreCase(row.facultyName, needle) ||
        includesIgnoreCase(row.semester, needle) ||
        includesIgnoreCase(row.room, needle)
    );
  }

  getClassesBySemester(semester: string, academicYear: string): ClassDetails[] {
    const wanted = semester.trim().toLowerCase();
    return this.listClasses().filter(
      (row) => row.semester.toLowerCase() === wanted && row.academicYear === academicYear.trim()
    );
  }

  getClassesByFaculty(facultyId: number): ClassDetails[] {
    return this.listClasses().filter((row) => row.facultyId === facultyId);
  }

  /** Classes taught by the logged-in faculty member. */
  getMyClasses(): ClassDetails[] {
    const session = this.requireRole("faculty");
    const member = this.sessionFaculty(session);
    if (!member) throw new NotFoundError("Faculty profile for this account");
    return this.getClassesByFaculty(member.id);
  }

  updateClass(id: number, patch: ClassUpdate): ClassDetails {
    this.requireRole("admin");
    if (!hasChanges(patch)) throw new ValidationError("No data to update.");
    this.validateClass(patch).assertValid("Invalid class data");

    const current = this.findClassOrThrow(id);
    if (patch.courseId !== undefined && patch.courseId !== current.courseId) {
      this.assertReferences(patch.courseId, undefined);
    }
    if (patch.facultyId !== undefined && patch.facultyId !== current.facultyId) {
      this.assertReferences(undefined, patch.facultyId);
    }
    if (patch.capacity !== undefined && patch.capacity < current.enrolledCount) {
      throw new ValidationError(
        `Capacity cannot be lower than the ${current.enrolledCount} students already enrolled.`
      );
    }

    try {
      this.db
        .update(classes)
        .set({
          classCode: patch.classCode?.trim().toUpperCase(),
          courseId: patch.courseId,
          facultyId: patch.facultyId,
          semester: patch.semester?.trim(),
          academicYear: patch.academicYear?.trim(),
          schedule: patch.schedule?.trim(),
          room: patch.room?.trim(),
          capacity: patch.capacity,
        })
        .where(eq(classes.id, id))
        .run();
    } catch (error) {
      throw translateDbError(error, "class");
    }
    return this.getClassDetails(id);
  }

  /**
   * Completing a class closes out its current enrollments; the enrolled count
   * is left as the final head count.
   */
  changeClassStatus(id: number, status: ClassStatus): SchoolClass {
    this.requireRole("admin");
    new FieldChecks().oneOf("Status", status, CLASS_STATUSES).assertValid("Invalid status");
    this.findClassOrThrow(id);

    const updated = this.db.transaction((tx) => {
      if (status === "completed") {
        tx.update(enrollments)
          .set({ status: "completed" })
          .where(and(eq(enrollments.classId, id), eq(enrollments.status, "enrolled")))
          .run();
      }
      return tx.update(classes).set({ status }).where(eq(classes.id, id)).returning().get();
    });
    if (!updated) throw new NotFoundError("Class", id);
    console.log(`[classes] ${updated.classCode} is now ${status}`);
    return updated;
  }

  /** Refused while students hold a seat or a completed record in the class. */
  deleteClass(id: number): void {
    this.requireRole("admin");
    const current = this.findClassOrThrow(id);

    this.db.transaction((tx) => {
      const holding = tx
        .select()
        .from(enrollments)
        .where(and(eq(enrollments.classId, id), ne(enrollments.status, "dropped")))
        .all();
      if (holding.length > 0) {
        throw new IntegrityError(
          `Class ${current.classCode} cannot be deleted: ${holding.length} enrollment(s) exist.`
        );
      }
      tx.delete(attendance).where(eq(attendance.classId, id)).run();
      tx.delete(enrollments).where(eq(enrollments.classId, id)).run();
      tx.delete(classes).where(eq(classes.id, id)).run();
    });
    console.log(`[classes] deleted ${current.classCode}`);
  }

  /** Current and completed enrollments; dropped students are left out. */
  getClassRoster(id: number): RosterEntry[] {
    this.requireClassStaff(this.findClassOrThrow(id));
    return this.db
      .select({
        enrollmentId: enrollments.id,
        studentId: students.id,
        studentNumber: students.studentNumber,
        firstName: students.firstName,
        lastName: students.lastName,
        major: students.major,
        yearLevel: students.yearLevel,
        enrolledAt: enrollments.enrolledAt,
        grade: enrollments.grade,
        status: enrollments.status,
      })
      .from(enrollments)
      .innerJoin(students, eq(enrollments.studentId, students.id))
      .where(and(eq(enrollments.classId, id), ne(enrollments.status, "dropped")))
      .orderBy(students.lastName, students.firstName)
      .all()
      .map(({ firstName, lastName, ...entry }) => ({
        ...entry,
        name: fullName({ firstName, lastName }),
      }));
  }
}
