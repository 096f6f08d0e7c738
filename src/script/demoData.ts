// src/script/demoData.ts
import type { Services } from "../services";
import type { CourseInput, FacultyInput, StudentInput } from "../types/models";
import { ValidationError } from "../utils/errors";

type DemoFaculty = Omit<FacultyInput, "password">;
type DemoStudent = Omit<StudentInput, "password">;

interface DemoClass {
  classCode: string;
  courseCode: string;
  employeeId: string;
  semester: string;
  academicYear: string;
  schedule: string;
  room: string;
  capacity: number;
}

interface DemoEnrollment {
  studentNumber: string;
  classCode: string;
}

export interface DemoData {
  password: string;
  courses: CourseInput[];
  faculty: DemoFaculty[];
  students: DemoStudent[];
  classes: DemoClass[];
  enrollments: DemoEnrollment[];
}

export interface SeedSummary {
  courses: number;
  faculty: number;
  students: number;
  classes: number;
  enrollments: number;
}

type FieldKind = "string" | "number" | "string[]" | "string?" | "number?";
type Shape<T> = { [K in keyof T]-?: FieldKind };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fieldMatches = (value: unknown, kind: FieldKind): boolean => {
  switch (kind) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number";
    case "string[]":
      return Array.isArray(value) && value.every((item) => typeof item === "string");
    case "string?":
      return value === undefined || typeof value === "string";
    case "number?":
      return value === undefined || typeof value === "number";
  }
};

const hasShape = <T>(value: unknown, shape: Shape<T>): value is T => {
  if (!isRecord(value)) return false;
  return Object.entries<FieldKind>(shape).every(([key, kind]) => fieldMatches(value[key], kind));
};

const listOf = <T>(data: Record<string, unknown>, key: string, shape: Shape<T>): T[] => {
  const list = data[key];
  if (!Array.isArray(list)) throw new ValidationError(`Demo data: "${key}" must be a list.`);
  const items: T[] = [];
  list.forEach((item, index) => {
    if (!hasShape<T>(item, shape)) {
      throw new ValidationError(`Demo data: ${key}[${index}] is malformed.`);
    }
    items.push(item);
  });
  return items;
};

const ACCOUNT = { username: "string", email: "string" } as const;

/** Checks the structure of a parsed demo-data file; field rules are left to the services. */
export const parseDemoData = (raw: unknown): DemoData => {
  if (!isRecord(raw) || typeof raw.password !== "string") {
    throw new ValidationError('Demo data must be an object with a "password".');
  }
  return {
    password: raw.password,
    courses: listOf<CourseInput>(raw, "courses", {
      code: "string",
      title: "string",
      description: "string?",
      credits: "number",
      department: "string",
      prerequisites: "string[]",
    }),
    faculty: listOf<DemoFaculty>(raw, "faculty", {
      ...ACCOUNT,
      firstName: "string",
      lastName: "string",
      employeeId: "string",
      department: "string",
      specialization: "string",
      phone: "string",
      officeLocation: "string",
      hireDate: "string?",
      salary: "number",
    }),
    students: listOf<DemoStudent>(raw, "students", {
      ...ACCOUNT,
      firstName: "string",
      lastName: "string",
      studentNumber: "string",
      major: "string",
      yearLevel: "number",
      phone: "string",
      enrollmentDate: "string?",
    }),
    classes: listOf<DemoClass>(raw, "classes", {
      classCode: "string",
      courseCode: "string",
      employeeId: "string",
      semester: "string",
      academicYear: "string",
      schedule: "string",
      room: "string",
      capacity: "number",
    }),
    enrollments: listOf<DemoEnrollment>(raw, "enrollments", {
      studentNumber: "string",
      classCode: "string",
    }),
  };
};

const lookup = <T>(map: Map<string, T>, key: string, what: string): T => {
  const found = map.get(key);
  if (found === undefined) throw new ValidationError(`Demo data: unknown ${what} "${key}".`);
  return found;
};

/**
 * Loads the demo records through the services, so every rule that applies to
 * a person at the console applies here too. Needs an admin session.
 */
export const seedDemoData = async (services: Services, data: DemoData): Promise<SeedSummary> => {
  const courseIds = new Map<string, number>();
  for (const input of data.courses) {
    const course = services.courses.createCourse(input);
    courseIds.set(course.code, course.id);
  }

  const facultyIds = new Map<string, number>();
  for (const input of data.faculty) {
    const member = await services.faculty.addFaculty({ ...input, password: data.password });
    facultyIds.set(member.employeeId, member.id);
  }

  const studentIds = new Map<string, number>();
  for (const input of data.students) {
    const student = await services.students.addStudent({ ...input, password: data.password });
    studentIds.set(student.studentNumber, student.id);
  }

  const classIds = new Map<string, number>();
  for (const { courseCode, employeeId, ...input } of data.classes) {
    const created = services.classes.addClass({
      ...input,
      courseId: lookup(courseIds, courseCode.toUpperCase(), "course"),
      facultyId: lookup(facultyIds, employeeId, "employee id"),
    });
    classIds.set(created.classCode, created.id);
  }

  for (const { studentNumber, classCode } of data.enrollments) {
    services.enrollment.enroll(
      lookup(classIds, classCode.toUpperCase(), "class"),
      lookup(studentIds, studentNumber, "student number")
    );
  }

  return {
    courses: courseIds.size,
    faculty: facultyIds.size,
    students: studentIds.size,
    classes: classIds.size,
    enrollments: data.enrollments.length,
  };
};
