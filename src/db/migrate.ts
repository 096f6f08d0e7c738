// src/db/migrate.ts
import type { Database } from "sql.js";

// Column names and defaults must stay in step with ./schema.ts.
const STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT NOT NULL UNIQUE,
    email TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('admin', 'faculty', 'student')),
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    is_active INTEGER NOT NULL DEFAULT 1
  )`,
  `CREATE TABLE IF NOT EXISTS faculty (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users (id),
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    employee_id TEXT NOT NULL UNIQUE,
    department TEXT NOT NULL,
    specialization TEXT NOT NULL,
    phone TEXT NOT NULL,
    office_location TEXT NOT NULL,
    hire_date TEXT NOT NULL,
    salary REAL NOT NULL CHECK (salary >= 0),
    is_active INTEGER NOT NULL DEFAULT 1
  )`,
  `CREATE TABLE IF NOT EXISTS courses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    course_code TEXT NOT NULL UNIQUE,
    course_name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    credits INTEGER NOT NULL CHECK (credits > 0),
    department TEXT NOT NULL,
    prerequisites TEXT NOT NULL DEFAULT '[]'
  )`,
  `CREATE TABLE IF NOT EXISTS classes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    class_code TEXT NOT NULL UNIQUE,
    course_id INTEGER NOT NULL REFERENCES courses (id),
    faculty_id INTEGER NOT NULL REFERENCES faculty (id),
    semester TEXT NOT NULL,
    academic_year TEXT NOT NULL,
    schedule TEXT NOT NULL,
    room TEXT NOT NULL,
    max_capacity INTEGER NOT NULL CHECK (max_capacity > 0),
    current_enrollment INTEGER NOT NULL DEFAULT 0
      CHECK (current_enrollment >= 0 AND current_enrollment <= max_capacity),
    status TEXT NOT NULL DEFAULT 'active'
      CHECK (status IN ('active', 'inactive', 'completed')),
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS students (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL REFERENCES users (id),
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    student_number TEXT NOT NULL UNIQUE,
    major TEXT NOT NULL,
    year_level INTEGER NOT NULL CHECK (year_level BETWEEN 1 AND 4),
    phone TEXT NOT NULL,
    email TEXT NOT NULL,
    enrollment_date TEXT NOT NULL,
    is_active INTEGER NOT NULL DEFAULT 1
  )`,
  `CREATE TABLE IF NOT EXISTS enrollments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    student_id INTEGER NOT NULL REFERENCES students (id),
    class_id INTEGER NOT NULL REFERENCES classes (id),
    enrollment_date TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    grade TEXT,
    status TEXT NOT NULL DEFAULT 'enrolled'
      CHECK (status IN ('enrolled', 'dropped', 'completed')),
    UNIQUE (student_id, class_id)
  )`,
  `CREATE TABLE IF NOT EXISTS attendance (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    class_id INTEGER NOT NULL REFERENCES classes (id),
    student_id INTEGER NOT NULL REFERENCES students (id),
    date TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('present', 'absent', 'late')),
    notes TEXT,
    UNIQUE (class_id, student_id, date)
  )`,
  `CREATE INDEX IF NOT EXISTS classes_faculty_idx ON classes (faculty_id)`,
  `CREATE INDEX IF NOT EXISTS classes_course_idx ON classes (course_id)`,
  `CREATE INDEX IF NOT EXISTS enrollments_class_idx ON enrollments (class_id)`,
  `CREATE INDEX IF NOT EXISTS attendance_class_date_idx ON attendance (class_id, date)`,
];

/** Creates every table and index that does not exist yet. */
export const ensureSchema = (sqlite: Database): void => {
  sqlite.run("BEGIN");
  try {
    for (const statement of STATEMENTS) {
      sqlite.exec(statement);
    }
    sqlite.run("COMMIT");
  } catch (error) {
    sqlite.run("ROLLBACK");
    throw error;
  }
};
