// src/routes/student.ts
import { MenuRouter } from "../cli/menu";
import * as attendanceController from "../controllers/attendanceController";
import * as authController from "../controllers/authController";
import * as studentController from "../controllers/studentController";
import { protect } from "../middlewares/auth";
import { restrictTo } from "../middlewares/roles";

export const studentRoutes = (): MenuRouter =>
  new MenuRouter("Student Dashboard", "Logout")
    .use(protect)
    .use(restrictTo("student"))
    .option("My Profile", authController.showProfile)
    .option("My Enrollments", studentController.myEnrollments)
    .option("Available Classes", studentController.myAvailableClasses)
    .option("My Attendance", attendanceController.myAttendance)
    .option("Change Password", authController.changePassword);
