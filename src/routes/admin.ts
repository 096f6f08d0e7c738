// src/routes/admin.ts
import { MenuRouter } from "../cli/menu";
import * as attendanceController from "../controllers/attendanceController";
import * as authController from "../controllers/authController";
import * as classController from "../controllers/classController";
import * as courseController from "../controllers/courseController";
import * as facultyController from "../controllers/facultyController";
import * as reportController from "../controllers/reportController";
import * as studentController from "../controllers/studentController";
import { protect } from "../middlewares/auth";
import { restrictTo } from "../middlewares/roles";

const adminMenu = (title: string, exitLabel?: string) =>
  new MenuRouter(title, exitLabel).use(protect).use(restrictTo("admin"));

// Faculty
const faculty = adminMenu("Faculty Management")
  .option("Add New Faculty", facultyController.addFaculty)
  .option("View All Faculty", facultyController.listFaculty)
  .option("View Faculty Details", facultyController.viewFaculty)
  .option("Search Faculty", facultyController.searchFaculty)
  .option("Faculty by Department", facultyController.facultyByDepartment)
  .option("Update Faculty Information", facultyController.updateFaculty)
  .option("Deactivate Faculty", facultyController.deactivateFaculty)
  .option("Reactivate Faculty", facultyController.reactivateFaculty)
  .option("Classes of a Faculty Member", facultyController.facultyClasses)
  .option("Faculty Workload", facultyController.facultyWorkload);

// Courses
const courses = adminMenu("Course Management")
  .option("Add New Course", courseController.addCourse)
  .option("View All Courses", courseController.listCourses)
  .option("View Course Details", courseController.viewCourse)
  .option("Search Courses", courseController.searchCourses)
  .option("Update Course", courseController.updateCourse)
  .option("Delete Course", courseController.deleteCourse);

// Classes
const classes = adminMenu("Class Management")
  .option("Add New Class", classController.addClass)
  .option("View All Classes", classController.listClasses)
  .option("View Class Details", classController.viewClass)
  .option("Search Classes", classController.searchClasses)
  .option("Classes by Semester", classController.classesBySemester)
  .option("Update Class", classController.updateClass)
  .option("Change Class Status", classController.changeClassStatus)
  .option("Delete Class", classController.deleteClass)
  .option("View Class Roster", classController.viewRoster);

// Students
const students = adminMenu("Student Management")
  .option("Add New Student", studentController.addStudent)
  .option("View All Students", studentController.listStudents)
  .option("View Student Details", studentController.viewStudent)
  .option("Search Students", studentController.searchStudents)
  .option("Students by Major", studentController.studentsByMajor)
  .option("Students by Year Level", studentController.studentsByYear)
  .option("Update Student Information", studentController.updateStudent)
  .option("Deactivate Student", studentController.deactivateStudent)
  .option("Reactivate Student", studentController.reactivateStudent)
  .option("Student Enrollments", studentController.studentEnrollments);

// Enrollment & attendance
const enrollment = adminMenu("Enrollment & Attendance")
  .option("Enroll Student in Class", studentController.enrollStudent)
  .option("Drop Student from Class", studentController.dropStudent)
  .option("Set Grade", classController.setGrade)
  .option("Record Attendance", attendanceController.recordAttendance)
  .option("View Class Attendance", attendanceController.viewClassAttendance)
  .option("Class Attendance Summary", attendanceController.attendanceSummary)
  .option("Student Attendance History", attendanceController.studentAttendance);

// Reports
const reports = adminMenu("Reports & Analytics")
  .option("Dashboard Summary", reportController.showReport("dashboard"))
  .option("Faculty Statistics", reportController.showReport("faculty"))
  .option("Faculty Workload", reportController.showReport("workload"))
  .option("Department Statistics", reportController.showReport("departments"))
  .option("Class Statistics by Semester", reportController.showReport("semesters"))
  .option("Enrollment per Class", reportController.showReport("classEnrollment"))
  .option("Student Statistics", reportController.showReport("students"))
  .option("Enrollment Distribution", reportController.showReport("enrollmentDistribution"))
  .option("Room Utilization", reportController.showReport("rooms"))
  .option("Export Data to CSV", reportController.exportData);

// Accounts
const accounts = adminMenu("Accounts & Users")
  .option("My Profile", authController.showProfile)
  .option("Change My Password", authController.changePassword)
  .option("List User Accounts", authController.listUsers)
  .option("Create Admin Account", authController.createAdmin)
  .option("Reset a User's Password", authController.resetPassword)
  .option("Deactivate User", authController.deactivateUser)
  .option("Reactivate User", authController.reactivateUser);

export const adminRoutes = (): MenuRouter =>
  adminMenu("Admin Dashboard", "Logout")
    .option("Overview", reportController.showReport("dashboard"))
    .mount("Faculty Management", faculty)
    .mount("Course Management", courses)
    .mount("Class Management", classes)
    .mount("Student Management", students)
    .mount("Enrollment & Attendance", enrollment)
    .mount("Reports & Analytics", reports)
    .mount("Accounts & Users", accounts);
