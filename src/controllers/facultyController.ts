// src/controllers/facultyController.ts
import type { Action } from "../cli/context";
import {
  askDecimal,
  askInteger,
  askOptional,
  askRequired,
  confirm,
  parseDecimal,
} from "../cli/prompter";
import { printTable } from "../cli/table";
import type { Prompter } from "../cli/prompter";
import type { Faculty, FacultyWorkload } from "../types/models";
import { fullName } from "../utils/helpers";
import { classesTable } from "./classController";

export const facultyTable = (title: string, members: Faculty[]) => ({
  title,
  columns: ["ID", "Name", "Employee ID", "Department", "Specialization", "Office", "Active"],
  rows: members.map((member) => [
    member.id,
    fullName(member),
    member.employeeId,
    member.department,
    member.specialization,
    member.officeLocation,
    member.isActive,
  ]),
});

const printWorkload = (io: Prompter, load: FacultyWorkload) => {
  io.print(`\nWorkload for ${load.name} (${load.employeeId}, ${load.department})`);
  io.print(`Active classes:     ${load.totalClasses}`);
  io.print(`Students taught:    ${load.totalStudents}`);
  io.print(`Average class size: ${load.averageClassSize}`);
  io.print(`Weekly hours:       ${load.weeklyHours}`);
};

export const addFaculty: Action = async ({ io, services }) => {
  io.print("\nNew faculty member");
  const firstName = await askRequired(io, "First name");
  const lastName = await askRequired(io, "Last name");
  const employeeId = await askRequired(io, "Employee ID");
  const department = await askRequired(io, "Department");
  const specialization = await askRequired(io, "Specialization");
  const phone = await askRequired(io, "Phone");
  const email = await askRequired(io, "Email");
  const officeLocation = await askRequired(io, "Office location");
  const salary = await askDecimal(io, "Salary");
  const hireDate = await askOptional(io, "Hire date (YYYY-MM-DD, blank for today)");
  const username = await askRequired(io, "Login username");
  const password = await askRequired(io, "Initial password");

  const member = await services.faculty.addFaculty({
    username,
    email,
    password,
    firstName,
    lastName,
    employeeId,
    department,
    specialization,
    phone,
    officeLocation,
    salary,
    hireDate,
  });
  io.print(`\nFaculty member ${fullName(member)} added with id ${member.id}.`);
};

export const listFaculty: Action = async ({ io, services }) => {
  const includeInactive = await confirm(io, "Include deactivated faculty?");
  printTable(io, facultyTable("Faculty", services.faculty.listFaculty({ includeInactive })));
};

export const viewFaculty: Action = async ({ io, services }) => {
  const member = services.faculty.getFaculty(await askInteger(io, "Faculty ID"));
  io.print(`\n${fullName(member)} (${member.employeeId})`);
  io.print(`Department:     ${member.department}`);
  io.print(`Specialization: ${member.specialization}`);
  io.print(`Phone:          ${member.phone}`);
  io.print(`Office:         ${member.officeLocation}`);
  io.print(`Hire date:      ${member.hireDate}`);
  io.print(`Salary:         ${member.salary}`);
  io.print(`Active:         ${member.isActive ? "yes" : "no"}`);
};

export const searchFaculty: Action = async ({ io, services }) => {
  const term = await askRequired(io, "Search term");
  printTable(io, facultyTable(`Faculty matching "${term}"`, services.faculty.searchFaculty(term)));
};

export const facultyByDepartment: Action = async ({ io, services }) => {
  const department = await askRequired(io, "Department");
  printTable(
    io,
    facultyTable(`Faculty in ${department}`, services.faculty.getFacultyByDepartment(department))
  );
};

export const updateFaculty: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Faculty ID");
  const current = services.faculty.getFaculty(id);
  io.print("Leave a field blank to keep its current value.");
  const firstName = await askOptional(io, "First name", current.firstName);
  const lastName = await askOptional(io, "Last name", current.lastName);
  const department = await askOptional(io, "Department", current.department);
  const specialization = await askOptional(io, "Specialization", current.specialization);
  const phone = await askOptional(io, "Phone", current.phone);
  const officeLocation = await askOptional(io, "Office location", current.officeLocation);
  const salary = await askOptional(io, "Salary", current.salary);

  const updated = services.faculty.updateFaculty(id, {
    firstName,
    lastName,
    department,
    specialization,
    phone,
    officeLocation,
    salary: salary === undefined ? undefined : parseDecimal("Salary", salary),
  });
  io.print(`\nFaculty member ${fullName(updated)} updated.`);
};

export const deactivateFaculty: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Faculty ID");
  const member = services.faculty.getFaculty(id);
  if (!(await confirm(io, `Deactivate ${fullName(member)}?`))) return;
  services.faculty.deactivateFaculty(id);
  io.print(`\n${fullName(member)} deactivated.`);
};

export const reactivateFaculty: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Faculty ID");
  services.faculty.reactivateFaculty(id);
  io.print(`\nFaculty member ${id} reactivated.`);
};

export const facultyClasses: Action = async ({ io, services }) => {
  const id = await askInteger(io, "Faculty ID");
  printTable(io, classesTable(`Classes of faculty ${id}`, services.faculty.getFacultyClasses(id)));
};

export const facultyWorkload: Action = async ({ io, services }) => {
  printWorkload(io, services.faculty.getFacultyWorkload(await askInteger(io, "Faculty ID")));
};

export const myWorkload: Action = async ({ io, services }) => {
  const me = services.faculty.getMyFacultyRecord();
  printWorkload(io, services.faculty.getFacultyWorkload(me.id));
};
