// src/routes/faculty.ts
import { MenuRouter } from "../cli/menu";
import * as attendanceController from "../controllers/attendanceController";
import * as authController from "../controllers/authController";
import * as classController from "../controllers/classController";
import * as facultyController from "../controllers/facultyController";
import { protect } from "../middlewares/auth";
import { restrictTo } from "../middlewares/roles";

export const facultyRoutes = (): MenuRouter =>
  new MenuRouter("Faculty Dashboard", "Logout")
    .use(protect)
    .use(restrictTo("faculty"))
    .option("My Profile", authController.showProfile)
    .option("My Classes", classController.myClasses)
    .option("Class Roster", classController.viewRoster)
    .option("Record Attendance", attendanceController.recordAttendance)
    .option("View Class Attendance", attendanceController.viewClassAttendance)
    .option("Attendance Summary", attendanceController.attendanceSummary)
    .option("Set Grade", classController.setGrade)
    .option("My Workload", facultyController.myWorkload)
    .option("Change Password", authController.changePassword);
