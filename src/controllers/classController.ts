// src/controllers/classController.ts
import type { Action } from "../cli/context";
import {
  askInteger,
  askOptional,
  askOptionalInteger,
  askRequired,
  confirm,
} from "../cli/prompter";
import { printTable } from "../cli/table";
import { CLASS_STATUSES } from "../db/schema";
import type { ClassDetails, RosterEntry } from "../types/models";
import { ValidationError } from "../utils/errors";
import { isOneOf } from "../utils/validation";

export const classesTable = (title: string, list: ClassDetails[]) => ({
  title,
  columns: ["ID", "Class", "Course", "Faculty", "Term", "Schedule", "Room", "Seats", "Status"],
  rows: list.map((row) => [
    row.id,
    row.classCode,
    row.courseTitle,
    row.facultyName,
    `${row.academicYear} ${row.semester}`,
    row.schedule,
    row.room,
    `${row.enrolledCount}/${row.capacity}`,
    row.status,
  ]),
});

export const rosterTable = (title: string, roster: RosterEntry[]) => ({
  title,
  columns: ["Student", "Student ID", "Name", "Major", "Year", "Grade", "Status"],
  rows: roster.map((entry) => [
    entry.studentId,
    entry.studentNumber,
    entry.name,
    entry.major,
    entry.yearLevel,
    entry.grade,
    entry.status,
  ]),
});

export const addClass: Action = async ({ io, services }) => {
  io.print("\nNew class");
  const classCode = await askRequired(io, "Class code");
  const courseId = await askInteger(io, "Course ID");
  const facultyId = await askInteger(io, "Faculty ID");
  const semester = await askRequired(io, "Semester (e.g. Fall)");
  const academicYear = await askRequired(io, "Academic year (YYYY)");
  const schedule = await askRequired(io, "Schedule (e.g. MWF 10:00-11:00)");
  const room = await askRequired(io, "Room");
  const capacity = await askInteger(io, "Capacity");

  const created = services.classes.addClass({
    classCode,
    courseId,
    facultyId,
    semester,
    academicYear,
    schedule,
    room,
    capacity,
  });
  io.print(`\nClass ${created.classCode} (${created.courseTitle}) created with id ${created.id}.`);
};

export const listClasses: Action = async ({ io, services }) => {
  printTable(io, classesTable("Classes", services.classes.listClasses()));
};

export const viewClass: Action = async ({ io, services }) => {
  const row = services.classes.getClass(await askInteger(io, "Class ID"));
  io.print(`\n${row.classCode}: ${row.courseCode} ${row.courseTitle}`);
  io.print(`Faculty:  ${row.facultyName}`);
  io.print(`Term:     ${row.academicYear} ${row.semester}`);
  io.print(`Schedule: ${row.schedule} in ${row.room}`);
  io.print(`Seats:    ${row.enrolledCount}/${row.capacity}`);
  io.print(`Status:   ${row.status}`);
};

export const searchClasses: Action = async ({ io, services }) => {
  const term = await askRequired(io, "Search term");
  printTable(io, classesTable(`Classes matching "${term}"`, services.classes.searchClasses(term)));
};

export const classesBySemester: Action = async ({ io, services }) => {
  const semester = await askRequired(io, "Semester");
  const academicYear = await askRequired(io, "Academic year");
  printTable(
    io,
    classesTable(
      `Classes in ${academicYear} ${semester}`,
      services.classes.getClassesBySemester(semester, academicYear)
    )
  );
};

export const updateClass: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Class ID");
  const current = services.classes.getClass(id);
  io.print("Leave a field blank to keep its current value.");
  const classCode = await askOptional(io, "Class code", current.classCode);
  const courseId = await askOptionalInteger(io, "Course ID", current.courseId);
  const facultyId = await askOptionalInteger(io, "Faculty ID", current.facultyId);
  const semester = await askOptional(io, "Semester", current.semester);
  const academicYear = await askOptional(io, "Academic year", current.academicYear);
  const schedule = await askOptional(io, "Schedule", current.schedule);
  const room = await askOptional(io, "Room", current.room);
  const capacity = await askOptionalInteger(io, "Capacity", current.capacity);

  const updated = services.classes.updateClass(id, {
    classCode,
    courseId,
    facultyId,
    semester,
    academicYear,
    schedule,
    room,
    capacity,
  });
  io.print(`\nClass ${updated.classCode} updated.`);
};

export const changeClassStatus: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Class ID");
  const status = (await askRequired(io, `New status (${CLASS_STATUSES.join("/")})`)).toLowerCase();
  if (!isOneOf(status, CLASS_STATUSES)) {
    throw new ValidationError(`Status must be one of: ${CLASS_STATUSES.join(", ")}`);
  }
  const updated = services.classes.changeClassStatus(id, status);
  io.print(`\nClass ${updated.classCode} is now ${updated.status}.`);
};

export const deleteClass: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Class ID");
  const row = services.classes.getClass(id);
  if (!(await confirm(io, `Delete class ${row.classCode}?`))) return;
  services.classes.deleteClass(id);
  io.print(`\nClass ${row.classCode} deleted.`);
};

export const viewRoster: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Class ID");
  const row = services.classes.getClass(id);
  printTable(io, rosterTable(`Roster of ${row.classCode}`, services.classes.getClassRoster(id)));
};

export const setGrade: Action = async ({ io, services }) => {
  const classId = await askInteger(io, "Class ID");
  const studentId = await askInteger(io, "Student ID");
  const grade = await askRequired(io, "Grade");
  const updated = services.enrollment.setGrade(classId, studentId, grade);
  io.print(`\nGrade ${updated.grade ?? "-"} recorded for student ${studentId}.`);
};

export const myClasses: Action = async ({ io, services }) => {
  printTable(io, classesTable("My Classes", services.classes.getMyClasses()));
};
