// src/db/schema.ts
import { sql } from "drizzle-orm";
import { integer, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const USER_ROLES = ["admin", "faculty", "student"] as const;
export const CLASS_STATUSES = ["active", "inactive", "completed"] as const;
export const ENROLLMENT_STATUSES = ["enrolled", "dropped", "completed"] as const;
export const ATTENDANCE_STATUSES = ["present", "absent", "late"] as const;

export const users = sqliteTable("users", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  username: text("username").notNull().unique(),
  email: text("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  role: text("role", { enum: USER_ROLES }).notNull(),
  createdAt: text("created_at")
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
});

export const faculty = sqliteTable("faculty", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  employeeId: text("employee_id").notNull().unique(),
  department: text("department").notNull(),
  specialization: text("specialization").notNull(),
  phone: text("phone").notNull(),
  officeLocation: text("office_location").notNull(),
  hireDate: text("hire_date").notNull(),
  salary: real("salary").notNull(),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
});

export const courses = sqliteTable("courses", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  code: text("course_code").notNull().unique(),
  title: text("course_name").notNull(),
  description: text("description").notNull().default(""),
  credits: integer("credits").notNull(),
  department: text("department").notNull(),
  prerequisites: text("prerequisites", { mode: "json" })
    .$type<string[]>()
    .notNull()
    .default(sql`'[]'`),
});

export const classes = sqliteTable("classes", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  classCode: text("class_code").notNull().unique(),
  courseId: integer("course_id")
    .notNull()
    .references(() => courses.id),
  facultyId: integer("faculty_id")
    .notNull()
    .references(() => faculty.id),
  semester: text("semester").notNull(),
  academicYear: text("academic_year").notNull(),
  schedule: text("schedule").notNull(),
  room: text("room").notNull(),
  capacity: integer("max_capacity").notNull(),
  enrolledCount: integer("current_enrollment").notNull().default(0),
  status: text("status", { enum: CLASS_STATUSES }).notNull().default("active"),
  createdAt: text("created_at")
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
});

export const students = sqliteTable("students", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  userId: integer("user_id")
    .notNull()
    .references(() => users.id),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  studentNumber: text("student_number").notNull().unique(),
  major: text("major").notNull(),
  yearLevel: integer("year_level").notNull(),
  phone: text("phone").notNull(),
  email: text("email").notNull(),
  enrollmentDate: text("enrollment_date").notNull(),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
});

export const enrollments = sqliteTable("enrollments", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  studentId: integer("student_id")
    .notNull()
    .references(() => students.id),
  classId: integer("class_id")
    .notNull()
    .references(() => classes.id),
  enrolledAt: text("enrollment_date")
    .notNull()
    .default(sql`CURRENT_TIMESTAMP`),
  grade: text("grade"),
  status: text("status", { enum: ENROLLMENT_STATUSES })
    .notNull()
    .default("enrolled"),
});

export const attendance = sqliteTable("attendance", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  classId: integer("class_id")
    .notNull()
    .references(() => classes.id),
  studentId: integer("student_id")
    .notNull()
    .references(() => students.id),
  date: text("date").notNull(),
  status: text("status", { enum: ATTENDANCE_STATUSES }).notNull(),
  notes: text("notes"),
});

export type UserRow = typeof users.$inferSelect;
export type FacultyRow = typeof faculty.$inferSelect;
export type CourseRow = typeof courses.$inferSelect;
export type ClassRow = typeof classes.$inferSelect;
export type StudentRow = typeof students.$inferSelect;
export type EnrollmentRow = typeof enrollments.$inferSelect;
export type AttendanceRow = typeof attendance.$inferSelect;
