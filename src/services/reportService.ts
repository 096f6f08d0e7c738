// src/services/reportService.ts
import { asc, eq } from "drizzle-orm";
import { classes, courses, enrollments, faculty, students } from "../db/schema";
import type {
  DashboardSummary,
  Faculty,
  FacultyWorkload,
  ReportTable,
  RoomUtilization,
  SchoolClass,
} from "../types/models";
import { fullName, percent, round2 } from "../utils/helpers";
import { weeklyHours } from "../utils/schedule";
import { BaseService } from "./baseService";

export const REPORTS = {
  dashboard: "Dashboard Summary",
  faculty: "Faculty Report",
  workload: "Faculty Workload",
  departments: "Department Statistics",
  semesters: "Semester Breakdown",
  classEnrollment: "Enrollment per Class",
  students: "Student Statistics",
  enrollmentDistribution: "Enrollment Distribution",
  rooms: "Room Utilization",
  facultyList: "Faculty",
  studentList: "Students",
  classList: "Classes",
  courseList: "Courses",
} as const;

export type ReportKey = keyof typeof REPORTS;

export const REPORT_KEYS = Object.keys(REPORTS).filter((key): key is ReportKey => key in REPORTS);

/** Groups rows under a string key, keeping first-seen order. */
const groupBy = <T>(rows: T[], keyOf: (row: T) => string): Map<string, T[]> => {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    groups.set(key, [...(groups.get(key) ?? []), row]);
  }
  return groups;
};

const sum = <T>(rows: T[], pick: (row: T) => number): number =>
  rows.reduce((total, row) => total + pick(row), 0);

const byName = (a: { name: string }, b: { name: string }) => a.name.localeCompare(b.name);

/**
 * Read-only aggregate views for administrators. Every view is also available
 * as a `ReportTable`, which is what the console prints and the CSV export writes.
 */
export class ReportService extends BaseService {
  private activeFaculty(): Faculty[] {
    return this.db
      .select()
      .from(faculty)
      .where(eq(faculty.isActive, true))
      .orderBy(asc(faculty.lastName), asc(faculty.firstName))
      .all();
  }

  private allClasses(): SchoolClass[] {
    return this.db.select().from(classes).all();
  }

  getDashboardSummary(): DashboardSummary {
    this.requireRole("admin");
    const members = this.activeFaculty();
    const classRows = this.allClasses();
    const totalEnrollment = sum(classRows, (row) => row.enrolledCount);
    const totalCapacity = sum(classRows, (row) => row.capacity);

    return {
      totalFaculty: members.length,
      totalStudents: this.db.select().from(students).where(eq(students.isActive, true)).all()
        .length,
      totalClasses: classRows.length,
      activeClasses: classRows.filter((row) => row.status === "active").length,
      totalDepartments: new Set(members.map((member) => member.department)).size,
      totalEnrollment,
      totalCapacity,
      utilizationRate: percent(totalEnrollment, totalCapacity),
    };
  }

  /** Active faculty, heaviest load first. */
  getFacultyWorkloads(): FacultyWorkload[] {
    this.requireRole("admin");
    const active = this.allClasses().filter((row) => row.status === "active");
    return this.activeFaculty()
      .map((member) =>
        this.buildWorkload(
          member,
          active.filter((row) => row.facultyId === member.id)
        )
      )
      .sort((a, b) => b.totalStudents - a.totalStudents || byName(a, b));
  }

  /** Active classes only; a class that cannot be parsed counts the default hours. */
  getRoomUtilization(): RoomUtilization[] {
    this.requireRole("admin");
    const active = this.allClasses().filter((row) => row.status === "active");
    return [...groupBy(active, (row) => row.room)]
      .map(([room, rows]) => {
        const hours = round2(
          sum(rows, (row) => weeklyHours(row.schedule, this.config.defaultClassHours))
        );
        return {
          room,
          classes: rows.length,
          weeklyHours: hours,
          utilizationRate: percent(hours, this.config.roomHoursPerWeek),
        };
      })
      .sort((a, b) => b.utilizationRate - a.utilizationRate || a.room.localeCompare(b.room));
  }

  dashboardReport(): ReportTable {
    const summary = this.getDashboardSummary();
    return {
      title: REPORTS.dashboard,
      columns: ["Metric", "Value"],
      rows: [
        ["Active Faculty", summary.totalFaculty],
        ["Active Students", summary.totalStudents],
        ["Total Classes", summary.totalClasses],
        ["Active Classes", summary.activeClasses],
        ["Departments", summary.totalDepartments],
        ["Total Enrollment", summary.totalEnrollment],
        ["Total Capacity", summary.totalCapacity],
        ["Utilization %", summary.utilizationRate],
      ],
    };
  }

  /** Headcount and average salary per department, with an overall line last. */
  facultyReport(): ReportTable {
    this.requireRole("admin");
    const members = this.activeFaculty();
    const departments = [...groupBy(members, (member) => member.department)].sort(([a], [b]) =>
      a.localeCompare(b)
    );
    const average = (rows: Faculty[]) =>
      rows.length > 0 ? round2(sum(rows, (row) => row.salary) / rows.length) : 0;

    return {
      title: REPORTS.faculty,
      columns: ["Department", "Faculty", "Average Salary"],
      rows: [
        ...departments.map(([department, rows]) => [department, rows.length, average(rows)]),
        ["All departments", members.length, average(members)],
      ],
    };
  }

  workloadReport(): ReportTable {
    return {
      title: REPORTS.workload,
      columns: [
        "Name",
        "Employee ID",
        "Department",
        "Classes",
        "Students",
        "Avg Class Size",
        "Weekly Hours",
      ],
      rows: this.getFacultyWorkloads().map((load) => [
        load.name,
        load.employeeId,
        load.department,
        load.totalClasses,
        load.totalStudents,
        load.averageClassSize,
        load.weeklyHours,
      ]),
    };
  }

  /** Departments of active faculty, counting the active classes they teach. */
  departmentReport(): ReportTable {
    this.requireRole("admin");
    const active = this.allClasses().filter((row) => row.status === "active");
    const departments = [...groupBy(this.activeFaculty(), (member) => member.department)].sort(
      ([a], [b]) => a.localeCompare(b)
    );

    return {
      title: REPORTS.departments,
      columns: [
        "Department",
        "Faculty",
        "Active Classes",
        "Enrollment",
        "Avg Class Size",
        "Classes per Faculty",
      ],
      rows: departments.map(([department, members]) => {
        const ids = new Set(members.map((member) => member.id));
        const taught = active.filter((row) => ids.has(row.facultyId));
        const enrollment = sum(taught, (row) => row.enrolledCount);
        return [
          department,
          members.length,
          taught.length,
          enrollment,
          taught.length > 0 ? round2(enrollment / taught.length) : 0,
          round2(taught.length / members.length),
        ];
      }),
    };
  }

  semesterReport(): ReportTable {
    this.requireRole("admin");
    const terms = [
      ...groupBy(this.allClasses(), (row) => `${row.academicYear} ${row.semester}`),
    ].sort(([a], [b]) => b.localeCompare(a));

    return {
      title: REPORTS.semesters,
      columns: ["Term", "Classes", "Enrollment", "Capacity", "Utilization %"],
      rows: terms.map(([term, rows]) => {
        const enrollment = sum(rows, (row) => row.enrolledCount);
        const capacity = sum(rows, (row) => row.capacity);
        return [term, rows.length, enrollment, capacity, percent(enrollment, capacity)];
      }),
    };
  }

  classEnrollmentReport(): ReportTable {
    this.requireRole("admin");
    return {
      title: REPORTS.classEnrollment,
      columns: ["Class", "Course", "Faculty", "Status", "Enrolled", "Capacity", "Fill %"],
      rows: this.listClassDetails().map((row) => [
        row.classCode,
        row.courseTitle,
        row.facultyName,
        row.status,
        row.enrolledCount,
        row.capacity,
        percent(row.enrolledCount, row.capacity),
      ]),
    };
  }

  /** Active students by major and by year level. */
  studentReport(): ReportTable {
    this.requireRole("admin");
    const active = this.db.select().from(students).where(eq(students.isActive, true)).all();
    const majors = [...groupBy(active, (student) => student.major)].sort(([a], [b]) =>
      a.localeCompare(b)
    );
    const years = [...groupBy(active, (student) => String(student.yearLevel))].sort(([a], [b]) =>
      a.localeCompare(b)
    );
    const averageYear =
      active.length > 0 ? round2(sum(active, (student) => student.yearLevel) / active.length) : 0;

    return {
      title: REPORTS.students,
      columns: ["Category", "Group", "Students"],
      rows: [
        ...majors.map(([major, rows]) => ["Major", major, rows.length]),
        ...years.map(([year, rows]) => ["Year level", year, rows.length]),
        ["Total", "All", active.length],
        ["Average year level", "All", averageYear],
      ],
    };
  }

  /** How many active students carry 0, 1, 2 ... current enrollments. */
  enrollmentDistributionReport(): ReportTable {
    this.requireRole("admin");
    const active = this.db.select().from(students).where(eq(students.isActive, true)).all();
    const current = this.db
      .select({ studentId: enrollments.studentId })
      .from(enrollments)
      .where(eq(enrollments.status, "enrolled"))
      .all();

    const perStudent = new Map<number, number>();
    for (const row of current) {
      perStudent.set(row.studentId, (perStudent.get(row.studentId) ?? 0) + 1);
    }
    const distribution = new Map<number, number>();
    for (const student of active) {
      const count = perStudent.get(student.id) ?? 0;
      distribution.set(count, (distribution.get(count) ?? 0) + 1);
    }

    return {
      title: REPORTS.enrollmentDistribution,
      columns: ["Current Enrollments", "Students"],
      rows: [...distribution].sort(([a], [b]) => a - b).map(([count, total]) => [count, total]),
    };
  }

  roomReport(): ReportTable {
    return {
      title: REPORTS.rooms,
      columns: ["Room", "Classes", "Weekly Hours", "Utilization %"],
      rows: this.getRoomUtilization().map((room) => [
        room.room,
        room.classes,
        room.weeklyHours,
        room.utilizationRate,
      ]),
    };
  }

  facultyListing(): ReportTable {
    this.requireRole("admin");
    const rows = this.db
      .select()
      .from(faculty)
      .orderBy(asc(faculty.lastName), asc(faculty.firstName))
      .all();
    return {
      title: REPORTS.facultyList,
      columns: [
        "ID",
        "Name",
        "Employee ID",
        "Department",
        "Specialization",
        "Phone",
        "Office",
        "Salary",
        "Hire Date",
        "Active",
      ],
      rows: rows.map((member) => [
        member.id,
        fullName(member),
        member.employeeId,
        member.department,
        member.specialization,
        member.phone,
        member.officeLocation,
        member.salary,
        member.hireDate,
        member.isActive,
      ]),
    };
  }

  studentListing(): ReportTable {
    this.requireRole("admin");
    const rows = this.db
      .select()
      .from(students)
      .orderBy(asc(students.lastName), asc(students.firstName))
      .all();
    return {
      title: REPORTS.studentList,
      columns: [
        "ID",
        "Name",
        "Student ID",
        "Major",
        "Year",
        "Phone",
        "Email",
        "Enrolled Since",
        "Active",
      ],
      rows: rows.map((student) => [
        student.id,
        fullName(student),
        student.studentNumber,
        student.major,
        student.yearLevel,
        student.phone,
        student.email,
        student.enrollmentDate,
        student.isActive,
      ]),
    };
  }

  classListing(): ReportTable {
    this.requireRole("admin");
    return {
      title: REPORTS.classList,
      columns: [
        "ID",
        "Class",
        "Course",
        "Faculty",
        "Term",
        "Schedule",
        "Room",
        "Enrolled",
        "Capacity",
        "Status",
      ],
      rows: this.listClassDetails().map((row) => [
        row.id,
        row.classCode,
        row.courseTitle,
        row.facultyName,
        `${row.academicYear} ${row.semester}`,
        row.schedule,
        row.room,
        row.enrolledCount,
        row.capacity,
        row.status,
      ]),
    };
  }

  courseListing(): ReportTable {
    this.requireRole("admin");
    const rows = this.db.select().from(courses).orderBy(asc(courses.code)).all();
    return {
      title: REPORTS.courseList,
      columns: ["ID", "Code", "Title", "Credits", "Department", "Prerequisites"],
      rows: rows.map((course) => [
        course.id,
        course.code,
        course.title,
        course.credits,
        course.department,
        course.prerequisites.join(" "),
      ]),
    };
  }

  buildReport(key: ReportKey): ReportTable {
    switch (key) {
      case "dashboard":
        return this.dashboardReport();
      case "faculty":
        return this.facultyReport();
      case "workload":
        return this.workloadReport();
      case "departments":
        return this.departmentReport();
      case "semesters":
        return this.semesterReport();
      case "classEnrollment":
        return this.classEnrollmentReport();
      case "students":
        return this.studentReport();
      case "enrollmentDistribution":
        return this.enrollmentDistributionReport();
      case "rooms":
        return this.roomReport();
      case "facultyList":
        return this.facultyListing();
      case "studentList":
        return this.studentListing();
      case "classList":
        return this.classListing();
      case "courseList":
        return this.courseListing();
    }
  }
}
