// src/services/courseService.ts
import { asc, eq } from "drizzle-orm";
import { classes, courses } from "../db/schema";
import type { Course, CourseInput, CourseUpdate } from "../types/models";
import { IntegrityError, NotFoundError, ValidationError, translateDbError } from "../utils/errors";
import { hasChanges, includesIgnoreCase } from "../utils/helpers";
import { FieldChecks } from "../utils/validation";
import { BaseService } from "./baseService";

const normalizePrerequisites = (codes: string[] | undefined): string[] | undefined =>
  codes?.map((code) => code.trim().toUpperCase()).filter((code) => code.length > 0);

export class CourseService extends BaseService {
  private validate(input: CourseUpdate, checks = new FieldChecks()): FieldChecks {
    if (input.code !== undefined) checks.required("Course code", input.code);
    if (input.title !== undefined) checks.required("Course title", input.title);
    if (input.department !== undefined) checks.required("Department", input.department);
    return checks.positiveInteger("Credits", input.credits);
  }

  createCourse(input: CourseInput): Course {
    this.requireRole("admin");
    this.validate(input)
      .required("Course code", input.code)
      .required("Course title", input.title)
      .required("Department", input.department)
      .assertValid("Invalid course data");

    try {
      const course = this.db
        .insert(courses)
        .values({
          code: input.code.trim().toUpperCase(),
          title: input.title.trim(),
          description: input.description?.trim() ?? "",
          credits: input.credits,
          department: input.department.trim(),
          prerequisites: normalizePrerequisites(input.prerequisites) ?? [],
        })
        .returning()
        .get();
      console.log(`[courses] created ${course.code}`);
      return course;
    } catch (error) {
      throw translateDbError(error, "course");
    }
  }

  listCourses(): Course[] {
    this.auth.requireSession();
    return this.db.select().from(courses).orderBy(asc(courses.code)).all();
  }

  getCourse(id: number): Course {
    this.auth.requireSession();
    const course = this.getCourseRow(id);
    if (!course) throw new NotFoundError("Course", id);
    return course;
  }

  searchCourses(term: string): Course[] {
    const needle = term.trim();
    if (!needle) throw new ValidationError("Search term cannot be empty.");
    return this.listCourses().filter(
      (course) =>
        includesIgnoreCase(course.code, needle) ||
        includesIgnoreCase(course.title, needle) ||
        includesIgnoreCase(course.department, needle)
    );
  }

  updateCourse(id: number, patch: CourseUpdate): Course {
    this.requireRole("admin");
    if (!hasChanges(patch)) throw new ValidationError("No data to update.");
    this.validate(patch).assertValid("Invalid course data");

    try {
      const updated = this.db
        .update(courses)
        .set({
          code: patch.code?.trim().toUpperCase(),
          title: patch.title?.trim(),
          description: patch.description?.trim(),
          credits: patch.credits,
          department: patch.department?.trim(),
          prerequisites: normalizePrerequisites(patch.prerequisites),
        })
        .where(eq(courses.id, id))
        .returning()
        .get();
      if (!updated) throw new NotFoundError("Course", id);
      return updated;
    } catch (error) {
      throw translateDbError(error, "course");
    }
  }

  /** Refused while any class, past or present, still points at the course. */
  deleteCourse(id: number): void {
    this.requireRole("admin");
    const course = this.getCourseRow(id);
    if (!course) throw new NotFoundError("Course", id);

    const dependent = this.db.select().from(classes).where(eq(classes.courseId, id)).get();
    if (dependent) {
      throw new IntegrityError(
        `Course ${course.code} cannot be deleted: class ${dependent.classCode} uses it.`
      );
    }
    this.db.delete(courses).where(eq(courses.id, id)).run();
    console.log(`[courses] deleted ${course.code}`);
  }
}
