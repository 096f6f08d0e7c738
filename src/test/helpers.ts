// src/test/helpers.ts
import os from "os";
import path from "path";
import type { AppConfig } from "../config";
import type { CliContext } from "../cli/context";
import type { Prompter } from "../cli/prompter";
import { openDatabase, type DatabaseHandle } from "../db";
import { createServices, type Services } from "../services";
import type {
  ClassInput,
  CourseInput,
  FacultyInput,
  Student,
  StudentInput,
} from "../types/models";

export const TEST_CONFIG: AppConfig = {
  databasePath: ":memory:",
  exportDir: path.join(os.tmpdir(), "campus-records-test-exports"),
  saltRounds: 4,
  defaultAdmin: { username: "admin", password: "admin123", email: "admin@campus.local" },
  roomHoursPerWeek: 40,
  defaultClassHours: 3,
};

export interface TestApp {
  handle: DatabaseHandle;
  services: Services;
  config: AppConfig;
}

/** A fresh in-memory database with the default admin, optionally logged in. */
export const createTestApp = async (
  options: { login?: boolean; config?: Partial<AppConfig> } = {}
): Promise<TestApp> => {
  const config = { ...TEST_CONFIG, ...options.config };
  const handle = await openDatabase(":memory:");
  const services = createServices(handle.db, config);
  await services.auth.ensureDefaultAdmin();
  if (options.login ?? true) {
    await services.auth.login(config.defaultAdmin.username, config.defaultAdmin.password);
  }
  return { handle, services, config };
};

// --- Fixtures ---

export const courseInput = (overrides: Partial<CourseInput> = {}): CourseInput => ({
  code: "CS110",
  title: "Programming Fundamentals",
  description: "Variables and loops",
  credits: 3,
  department: "Computer Science",
  prerequisites: [],
  ...overrides,
});

export const facultyInput = (overrides: Partial<FacultyInput> = {}): FacultyInput => ({
  username: "mreyes",
  email: "m.reyes@campus.example",
  password: "test-secret",
  firstName: "Marta",
  lastName: "Reyes",
  employeeId: "EMP-101",
  department: "Computer Science",
  specialization: "Compilers",
  phone: "555-201-0101",
  officeLocation: "Hall A 210",
  hireDate: "2016-08-15",
  salary: 78000,
  ...overrides,
});

export const studentInput = (overrides: Partial<StudentInput> = {}): StudentInput => ({
  username: "ana.silva",
  email: "ana.silva@student.example",
  password: "test-secret",
  firstName: "Ana",
  lastName: "Silva",
  studentNumber: "STU-0001",
  major: "Computer Science",
  yearLevel: 1,
  phone: "555-301-0001",
  enrollmentDate: "2024-08-26",
  ...overrides,
});

export const classInput = (
  courseId: number,
  facultyId: number,
  overrides: Partial<ClassInput> = {}
): ClassInput => ({
  classCode: "CS110-A",
  courseId,
  facultyId,
  semester: "Fall",
  academicYear: "2024",
  schedule: "MWF 09:00-10:00",
  room: "A-101",
  capacity: 30,
  ...overrides,
});

/** One course, one faculty member and one class taught by them. */
export const seedClass = async (services: Services, overrides: Partial<ClassInput> = {}) => {
  const course = services.courses.createCourse(courseInput());
  const member = await services.faculty.addFaculty(facultyInput());
  const created = services.classes.addClass(classInput(course.id, member.id, overrides));
  return { course, member, classRow: created };
};

/** Adds `count` students numbered from 1. */
export const seedStudents = async (services: Services, count: number) => {
  const created: Student[] = [];
  for (let n = 1; n <= count; n++) {
    const suffix = String(n).padStart(4, "0");
    created.push(
      await services.students.addStudent(
        studentInput({
          username: `student${n}`,
          email: `student${n}@student.example`,
          studentNumber: `STU-${suffix}`,
          firstName: `Student${n}`,
          lastName: "Test",
        })
      )
    );
  }
  return created;
};

/** Scripted terminal: answers are handed out in order, then "0" forever. */
export class FakePrompter implements Prompter {
  readonly questions: string[] = [];
  readonly lines: string[] = [];
  closed = false;

  constructor(private readonly answers: string[] = []) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? "0";
  }

  print(line = ""): void {
    this.lines.push(line);
  }

  onInterrupt(): void {}

  close(): void {
    this.closed = true;
  }

  get output(): string {
    return this.lines.join("\n");
  }
}

export const cliContext = (app: TestApp, io: Prompter): CliContext => ({
  io,
  services: app.services,
  config: app.config,
  persist: app.handle.save,
});
