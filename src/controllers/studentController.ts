// src/controllers/studentController.ts
import type { Action } from "../cli/context";
import {
  askInteger,
  askOptional,
  askOptionalInteger,
  askRequired,
  confirm,
} from "../cli/prompter";
import { printTable } from "../cli/table";
import type { AvailableClass, Student, StudentEnrollment } from "../types/models";
import { fullName } from "../utils/helpers";

const studentsTable = (title: string, list: Student[]) => ({
  title,
  columns: ["ID", "Name", "Student ID", "Major", "Year", "Email", "Active"],
  rows: list.map((student) => [
    student.id,
    fullName(student),
    student.studentNumber,
    student.major,
    student.yearLevel,
    student.email,
    student.isActive,
  ]),
});

const enrollmentsTable = (title: string, list: StudentEnrollment[]) => ({
  title,
  columns: ["Class ID", "Class", "Course", "Faculty", "Term", "Schedule", "Grade", "Status"],
  rows: list.map((row) => [
    row.classId,
    row.classCode,
    row.courseTitle,
    row.facultyName,
    `${row.academicYear} ${row.semester}`,
    row.schedule,
    row.grade,
    row.status,
  ]),
});

const availableTable = (title: string, list: AvailableClass[]) => ({
  title,
  columns: ["Class ID", "Class", "Course", "Faculty", "Term", "Schedule", "Room", "Free Seats"],
  rows: list.map((row) => [
    row.classId,
    row.classCode,
    row.courseTitle,
    row.facultyName,
    `${row.academicYear} ${row.semester}`,
    row.schedule,
    row.room,
    row.availableSeats,
  ]),
});

export const addStudent: Action = async ({ io, services }) => {
  io.print("\nNew student");
  const firstName = await askRequired(io, "First name");
  const lastName = await askRequired(io, "Last name");
  const studentNumber = await askRequired(io, "Student ID");
  const major = await askRequired(io, "Major");
  const yearLevel = await askInteger(io, "Year level (1-4)");
  const phone = await askRequired(io, "Phone");
  const email = await askRequired(io, "Email");
  const enrollmentDate = await askOptional(io, "Enrollment date (YYYY-MM-DD, blank for today)");
  const username = await askRequired(io, "Login username");
  const password = await askRequired(io, "Initial password");

  const student = await services.students.addStudent({
    username,
    email,
    password,
    firstName,
    lastName,
    studentNumber,
    major,
    yearLevel,
    phone,
    enrollmentDate,
  });
  io.print(`\nStudent ${fullName(student)} added with id ${student.id}.`);
};

export const listStudents: Action = async ({ io, services }) => {
  const includeInactive = await confirm(io, "Include deactivated students?");
  printTable(io, studentsTable("Students", services.students.listStudents({ includeInactive })));
};

export const viewStudent: Action = async ({ io, services }) => {
  const student = services.students.getStudent(await askInteger(io, "Student ID (record id)"));
  io.print(`\n${fullName(student)} (${student.studentNumber})`);
  io.print(`Major:          ${student.major}, year ${student.yearLevel}`);
  io.print(`Phone:          ${student.phone}`);
  io.print(`Email:          ${student.email}`);
  io.print(`Enrolled since: ${student.enrollmentDate}`);
  io.print(`Active:         ${student.isActive ? "yes" : "no"}`);
};

export const searchStudents: Action = async ({ io, services }) => {
  const term = await askRequired(io, "Search term");
  printTable(
    io,
    studentsTable(`Students matching "${term}"`, services.students.searchStudents(term))
  );
};

export const studentsByMajor: Action = async ({ io, services }) => {
  const major = await askRequired(io, "Major");
  printTable(io, studentsTable(`Students in ${major}`, services.students.getStudentsByMajor(major)));
};

export const studentsByYear: Action = async ({ io, services }) => {
  const year = await askInteger(io, "Year level");
  printTable(io, studentsTable(`Year ${year} students`, services.students.getStudentsByYear(year)));
};

export const updateStudent: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Student ID (record id)");
  const current = services.students.getStudent(id);
  io.print("Leave a field blank to keep its current value.");
  const firstName = await askOptional(io, "First name", current.firstName);
  const lastName = await askOptional(io, "Last name", current.lastName);
  const major = await askOptional(io, "Major", current.major);
  const yearLevel = await askOptionalInteger(io, "Year level", current.yearLevel);
  const phone = await askOptional(io, "Phone", current.phone);
  const email = await askOptional(io, "Email", current.email);

  const updated = services.students.updateStudent(id, {
    firstName,
    lastName,
    major,
    yearLevel,
    phone,
    email,
  });
  io.print(`\nStudent ${fullName(updated)} updated.`);
};

export const deactivateStudent: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Student ID (record id)");
  const student = services.students.getStudent(id);
  if (!(await confirm(io, `Deactivate ${fullName(student)}?`))) return;
  services.students.deactivateStudent(id);
  io.print(`\n${fullName(student)} deactivated.`);
};

export const reactivateStudent: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Student ID (record id)");
  services.students.reactivateStudent(id);
  io.print(`\nStudent ${id} reactivated.`);
};

export const studentEnrollments: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Student ID (record id)");
  printTable(
    io,
    enrollmentsTable(`Enrollments of student ${id}`, services.students.getStudentEnrollments(id))
  );
};

export const enrollStudent: Action = async ({ io, services }) => {
  const studentId = await askInteger(io, "Student ID (record id)");
  printTable(
    io,
    availableTable("Available classes", services.students.getAvailableClasses(studentId))
  );
  const classId = await askInteger(io, "Class ID");
  services.students.enrollStudentInClass(studentId, classId);
  io.print(`\nStudent ${studentId} enrolled in class ${classId}.`);
};

export const dropStudent: Action = async ({ io, services }) => {
  const studentId = await askInteger(io, "Student ID (record id)");
  const classId = await askInteger(io, "Class ID");
  if (!(await confirm(io, `Drop student ${studentId} from class ${classId}?`))) return;
  services.students.dropStudentFromClass(studentId, classId);
  io.print(`\nStudent ${studentId} dropped from class ${classId}.`);
};

// --- Student self-service ---

export const myEnrollments: Action = async ({ io, services }) => {
  const me = services.students.getMyStudentRecord();
  printTable(io, enrollmentsTable("My Enrollments", services.students.getStudentEnrollments(me.id)));
};

export const myAvailableClasses: Action = async ({ io, services }) => {
  const me = services.students.getMyStudentRecord();
  printTable(io, availableTable("Open Classes", services.students.getAvailableClasses(me.id)));
};
