// services/index.ts
import type { AppConfig } from "../config";
import type { AppDatabase } from "../db";
import { AttendanceService } from "./attendanceService";
import { AuthService } from "./authService";
import { ClassService } from "./classService";
import { CourseService } from "./courseService";
import { EnrollmentService } from "./enrollmentService";
import { ExportService } from "./exportService";
import { FacultyService } from "./facultyService";
import { ReportService } from "./reportService";
import { StudentService } from "./studentService";

export interface Services {
  auth: AuthService;
  faculty: FacultyService;
  courses: CourseService;
  classes: ClassService;
  students: StudentService;
  enrollment: EnrollmentService;
  attendance: AttendanceService;
  reports: ReportService;
  exports: ExportService;
}

/** Every service shares one database handle and one session. */
export const createServices = (db: AppDatabase, config: AppConfig): Services => {
  const auth = new AuthService(db, config);
  const enrollment = new EnrollmentService(db, auth, config);
  return {
    auth,
    faculty: new FacultyService(db, auth, config),
    courses: new CourseService(db, auth, config),
    classes: new ClassService(db, auth, config),
    students: new StudentService(db, auth, config, enrollment),
    enrollment,
    attendance: new AttendanceService(db, auth, config),
    reports: new ReportService(db, auth, config),
    exports: new ExportService(auth, config),
  };
};
