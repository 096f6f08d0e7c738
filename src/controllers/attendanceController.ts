// src/controllers/attendanceController.ts
import type { Action } from "../cli/context";
import { askInteger, askOptional } from "../cli/prompter";
import { printTable } from "../cli/table";
import type {
  AttendanceEntry,
  AttendanceStatus,
  StudentAttendanceEntry,
} from "../types/models";
import { ValidationError } from "../utils/errors";
import { today } from "../utils/helpers";

const STATUS_KEYS: Partial<Record<string, AttendanceStatus>> = {
  p: "present",
  a: "absent",
  l: "late",
};

const studentAttendanceTable = (title: string, list: StudentAttendanceEntry[]) => ({
  title,
  columns: ["Date", "Class", "Course", "Status", "Notes"],
  rows: list.map((row) => [row.date, row.classCode, row.courseTitle, row.status, row.notes]),
});

/** Walks the current roster and asks for one mark per student. */
export const recordAttendance: Action = async ({ io, services }) => {
  const classId = await askInteger(io, "Class ID");
  const roster = services.classes
    .getClassRoster(classId)
    .filter((entry) => entry.status === "enrolled");
  if (roster.length === 0) {
    io.print("\nNo students are currently enrolled in this class.");
    return;
  }
  const date = (await askOptional(io, "Date (YYYY-MM-DD)", today())) ?? today();

  io.print("Mark each student: p = present, a = absent, l = late (blank = present).");
  const entries: AttendanceEntry[] = [];
  for (const student of roster) {
    const answer = (await io.ask(`${student.name} (${student.studentNumber}): `)).toLowerCase();
    const status = answer === "" ? "present" : STATUS_KEYS[answer];
    if (!status) {
      throw new ValidationError(`"${answer}" is not a valid mark. Use p, a or l.`);
    }
    entries.push({ studentId: student.studentId, status });
  }

  const saved = services.attendance.recordAttendance(classId, date, entries);
  io.print(`\nAttendance saved for ${saved.length} student(s) on ${date}.`);
};

export const viewClassAttendance: Action = async ({ io, services }) => {
  const classId = await askInteger(io, "Class ID");
  const date = await askOptional(io, "Date (YYYY-MM-DD, blank for all)");
  const marks = services.attendance.getClassAttendance(classId, date);
  printTable(io, {
    title: date ? `Attendance on ${date}` : "Attendance",
    columns: ["Date", "Student ID", "Name", "Status", "Notes"],
    rows: marks.map((row) => [row.date, row.studentNumber, row.name, row.status, row.notes]),
  });
};

export const attendanceSummary: Action = async ({ io, services }) => {
  const classId = await askInteger(io, "Class ID");
  const summary = services.attendance.getAttendanceSummary(classId);
  printTable(io, {
    title: "Attendance Summary",
    columns: ["Student ID", "Name", "Present", "Late", "Absent", "Sessions", "Rate %"],
    rows: summary.map((row) => [
      row.studentNumber,
      row.name,
      row.present,
      row.late,
      row.absent,
      row.sessions,
      row.attendanceRate,
    ]),
  });
};

export const studentAttendance: Action = async ({ io, services }) => {
  const studentId = await askInteger(io, "Student ID (record id)");
  printTable(
    io,
    studentAttendanceTable(
      `Attendance of student ${studentId}`,
      services.attendance.getStudentAttendance(studentId)
    )
  );
};

export const myAttendance: Action = async ({ io, services }) => {
  const me = services.students.getMyStudentRecord();
  printTable(
    io,
    studentAttendanceTable("My Attendance", services.attendance.getStudentAttendance(me.id))
  );
};

