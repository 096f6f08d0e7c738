// src/services/enrollmentService.ts
import { and, eq, sql } from "drizzle-orm";
import { classes, enrollments, students } from "../db/schema";
import type { Enrollment } from "../types/models";
import {
  CapacityExceeded,
  DuplicateError,
  NotFoundError,
  ValidationError,
} from "../utils/errors";
import { sqlTimestamp } from "../utils/helpers";
import { BaseService } from "./baseService";

/**
 * Roster changes. The capacity check, the enrollment write and the class's
 * enrolled count move together inside one transaction.
 */
export class EnrollmentService extends BaseService {
  enroll(classId: number, studentId: number): Enrollment {
    this.requireClassStaff(this.findClassOrThrow(classId));

    const enrollment = this.db.transaction((tx) => {
      const classRow = tx.select().from(classes).where(eq(classes.id, classId)).get();
      if (!classRow) throw new NotFoundError("Class", classId);
      if (classRow.status !== "active") {
        throw new ValidationError(`Class ${classRow.classCode} is not active.`);
      }

      const student = tx.select().from(students).where(eq(students.id, studentId)).get();
      if (!student) throw new NotFoundError("Student", studentId);
      if (!student.isActive) {
        throw new ValidationError(`Student ${student.studentNumber} is not active.`);
      }

      const existing = tx
        .select()
        .from(enrollments)
        .where(and(eq(enrollments.classId, classId), eq(enrollments.studentId, studentId)))
        .get();
      if (existing && existing.status !== "dropped") {
        throw new DuplicateError(
          `Student ${student.studentNumber} is already ${existing.status} in ${classRow.classCode}.`
        );
      }
      if (classRow.enrolledCount >= classRow.capacity) {
        throw new CapacityExceeded(classRow.classCode, classRow.capacity);
      }

      tx.update(classes)
        .set({ enrolledCount: sql`${classes.enrolledCount} + 1` })
        .where(eq(classes.id, classId))
        .run();

      if (existing) {
        return tx
          .update(enrollments)
          .set({ status: "enrolled", grade: null, enrolledAt: sqlTimestamp() })
          .where(eq(enrollments.id, existing.id))
          .returning()
          .get();
      }
      return tx.insert(enrollments).values({ classId, studentId }).returning().get();
    });

    if (!enrollment) throw new NotFoundError("Enrollment");
    console.log(`[enrollment] student ${studentId} enrolled in class ${classId}`);
    return enrollment;
  }

  drop(classId: number, studentId: number): void {
    this.requireClassStaff(this.findClassOrThrow(classId));

    this.db.transaction((tx) => {
      const existing = tx
        .select()
        .from(enrollments)
        .where(
          and(
            eq(enrollments.classId, classId),
            eq(enrollments.studentId, studentId),
            eq(enrollments.status, "enrolled")
          )
        )
        .get();
      if (!existing) {
        throw new NotFoundError(`Active enrollment of student ${studentId} in class ${classId}`);
      }

      tx.update(enrollments).set({ status: "dropped" }).where(eq(enrollments.id, existing.id)).run();
      tx.update(classes)
        .set({ enrolledCount: sql`${classes.enrolledCount} - 1` })
        .where(eq(classes.id, classId))
        .run();
    });
    console.log(`[enrollment] student ${studentId} dropped from class ${classId}`);
  }

  setGrade(classId: number, studentId: number, grade: string): Enrollment {
    this.requireClassStaff(this.findClassOrThrow(classId));
    const value = grade.trim().toUpperCase();
    if (!value) throw new ValidationError("Grade is required.");

    const updated = this.db
      .update(enrollments)
      .set({ grade: value })
      .where(
        and(
          eq(enrollments.classId, classId),
          eq(enrollments.studentId, studentId),
          sql`${enrollments.status} <> 'dropped'`
        )
      )
      .returning()
      .get();
    if (!updated) {
      throw new NotFoundError(`Enrollment of student ${studentId} in class ${classId}`);
    }
    return updated;
  }
}
