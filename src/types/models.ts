/**
 * @file src/types/models.ts
 * @description Shared domain types. Row types come from the drizzle schema;
 * everything here is what services accept and return.
 */
import type {
  ATTENDANCE_STATUSES,
  CLASS_STATUSES,
  ENROLLMENT_STATUSES,
  USER_ROLES,
  AttendanceRow,
  ClassRow,
  CourseRow,
  EnrollmentRow,
  FacultyRow,
  StudentRow,
  UserRow,
} from "../db/schema";

// =================================================================
// 1. CORE & USER-RELATED TYPES
// =================================================================
export type UserRole = (typeof USER_ROLES)[number];
export type ClassStatus = (typeof CLASS_STATUSES)[number];
export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

export type User = Omit<UserRow, "passwordHash">;

export interface Session {
  userId: number;
  username: string;
  role: UserRole;
  loggedInAt: Date;
}

export interface UserProfile extends User {
  faculty?: Faculty;
  student?: Student;
}

// =================================================================
// 2. PEOPLE
// =================================================================
export type Faculty = FacultyRow;
export type Student = StudentRow;

export interface AccountInput {
  username: string;
  email: string;
  password: string;
}

export interface FacultyInput extends AccountInput {
  firstName: string;
  lastName: string;
  employeeId: string;
  department: string;
  specialization: string;
  phone: string;
  officeLocation: string;
  hireDate?: string;
  salary: number;
}

export type FacultyUpdate = Partial<
  Pick<
    Faculty,
    | "firstName"
    | "lastName"
    | "employeeId"
    | "department"
    | "specialization"
    | "phone"
    | "officeLocation"
    | "hireDate"
    | "salary"
  >
>;

export interface StudentInput extends AccountInput {
  firstName: string;
  lastName: string;
  studentNumber: string;
  major: string;
  yearLevel: number;
  phone: string;
  enrollmentDate?: string;
}

export type StudentUpdate = Partial<
  Pick<
    Student,
    "firstName" | "lastName" | "studentNumber" | "major" | "yearLevel" | "phone" | "email"
  >
>;

// =================================================================
// 3. ACADEMICS
// =================================================================
export type Course = CourseRow;

export interface CourseInput {
  code: string;
  title: string;
  description?: string;
  credits: number;
  department: string;
  prerequisites?: string[];
}

export type CourseUpdate = Partial<CourseInput>;

export type SchoolClass = ClassRow;

/** A class joined with the names a person reads on screen. */
export interface ClassDetails extends SchoolClass {
  courseCode: string;
  courseTitle: string;
  facultyName: string;
}

export interface ClassInput {
  classCode: string;
  courseId: number;
  facultyId: number;
  semester: string;
  academicYear: string;
  schedule: string;
  room: string;
  capacity: number;
}

export type ClassUpdate = Partial<ClassInput>;

export type Enrollment = EnrollmentRow;

export interface RosterEntry {
  enrollmentId: number;
  studentId: number;
  studentNumber: string;
  name: string;
  major: string;
  yearLevel: number;
  enrolledAt: string;
  grade: string | null;
  status: EnrollmentStatus;
}

export interface StudentEnrollment {
  enrollmentId: number;
  classId: number;
  classCode: string;
  courseTitle: string;
  facultyName: string;
  semester: string;
  academicYear: string;
  schedule: string;
  room: string;
  enrolledAt: string;
  grade: string | null;
  status: EnrollmentStatus;
}

export interface AvailableClass {
  classId: number;
  classCode: string;
  courseTitle: string;
  facultyName: string;
  semester: string;
  academicYear: string;
  schedule: string;
  room: string;
  availableSeats: number;
}

export type AttendanceRecord = AttendanceRow;

export interface AttendanceEntry {
  studentId: number;
  status: AttendanceStatus;
  notes?: string;
}

/** One attendance mark with the student it belongs to. */
export interface ClassAttendanceEntry {
  id: number;
  date: string;
  studentId: number;
  studentNumber: string;
  name: string;
  status: AttendanceStatus;
  notes: string | null;
}

export interface StudentAttendanceEntry {
  id: number;
  date: string;
  classId: number;
  classCode: string;
  courseTitle: string;
  status: AttendanceStatus;
  notes: string | null;
}

export interface AttendanceSummaryRow {
  studentId: number;
  studentNumber: string;
  name: string;
  present: number;
  late: number;
  absent: number;
  sessions: number;
  attendanceRate: number;
}

// =================================================================
// 4. REPORTING
// =================================================================
export type CellValue = string | number | boolean | null;

/** Columns are what the console prints and what the CSV header carries. */
export interface ReportTable {
  title: string;
  columns: string[];
  rows: CellValue[][];
}

export interface FacultyWorkload {
  facultyId: number;
  name: string;
  employeeId: string;
  department: string;
  totalClasses: number;
  totalStudents: number;
  averageClassSize: number;
  weeklyHours: number;
}

export interface DashboardSummary {
  totalFaculty: number;
  totalStudents: number;
  totalClasses: number;
  activeClasses: number;
  totalDepartments: number;
  totalEnrollment: number;
  totalCapacity: number;
  utilizationRate: number;
}

export interface RoomUtilization {
  room: string;
  classes: number;
  weeklyHours: number;
  utilizationRate: number;
}

export interface ExportResult {
  filePath: string;
  recordsExported: number;
}
