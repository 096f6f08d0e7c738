// src/controllers/courseController.ts
import type { Action } from "../cli/context";
import {
  askInteger,
  askOptional,
  askOptionalInteger,
  askRequired,
  confirm,
} from "../cli/prompter";
import { printTable } from "../cli/table";
import type { Course } from "../types/models";

const splitCodes = (raw: string | undefined): string[] | undefined =>
  raw?.split(/[\s,]+/).filter((code) => code.length > 0);

const coursesTable = (title: string, list: Course[]) => ({
  title,
  columns: ["ID", "Code", "Title", "Credits", "Department", "Prerequisites"],
  rows: list.map((course) => [
    course.id,
    course.code,
    course.title,
    course.credits,
    course.department,
    course.prerequisites.join(" ") || null,
  ]),
});

export const addCourse: Action = async ({ io, services }) => {
  const code = await askRequired(io, "Course code");
  const title = await askRequired(io, "Course title");
  const description = await askOptional(io, "Description");
  const credits = await askInteger(io, "Credits");
  const department = await askRequired(io, "Department");
  const prerequisites = splitCodes(await askOptional(io, "Prerequisite codes (comma separated)"));

  const course = services.courses.createCourse({
    code,
    title,
    description,
    credits,
    department,
    prerequisites,
  });
  io.print(`\nCourse ${course.code} created with id ${course.id}.`);
};

export const listCourses: Action = async ({ io, services }) => {
  printTable(io, coursesTable("Courses", services.courses.listCourses()));
};

export const viewCourse: Action = async ({ io, services }) => {
  const course = services.courses.getCourse(await askInteger(io, "Course ID"));
  io.print(`\n${course.code}: ${course.title}`);
  io.print(`Department:    ${course.department}`);
  io.print(`Credits:       ${course.credits}`);
  io.print(`Prerequisites: ${course.prerequisites.join(", ") || "none"}`);
  if (course.description) io.print(`\n${course.description}`);
};

export const searchCourses: Action = async ({ io, services }) => {
  const term = await askRequired(io, "Search term");
  printTable(io, coursesTable(`Courses matching "${term}"`, services.courses.searchCourses(term)));
};

export const updateCourse: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Course ID");
  const current = services.courses.getCourse(id);
  io.print("Leave a field blank to keep its current value.");
  const code = await askOptional(io, "Course code", current.code);
  const title = await askOptional(io, "Course title", current.title);
  const description = await askOptional(io, "Description");
  const credits = await askOptionalInteger(io, "Credits", current.credits);
  const department = await askOptional(io, "Department", current.department);
  const prerequisites = splitCodes(
    await askOptional(io, "Prerequisite codes", current.prerequisites.join(", "))
  );

  const updated = services.courses.updateCourse(id, {
    code,
    title,
    description,
    credits,
    department,
    prerequisites,
  });
  io.print(`\nCourse ${updated.code} updated.`);
};

export const deleteCourse: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Course ID");
  const course = services.courses.getCourse(id);
  if (!(await confirm(io, `Delete course ${course.code}?`))) return;
  services.courses.deleteCourse(id);
  io.print(`\nCourse ${course.code} deleted.`);
};
