import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DuplicateError,
  ForbiddenError,
  NotFoundError,
  ValidationError,
} from "../utils/errors";
import {
  classInput,
  courseInput,
  createTestApp,
  facultyInput,
  type TestApp,
} from "../test/helpers";

describe("FacultyService", () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(() => app.handle.close());

  it("round-trips every field through create and read", async () => {
    const { faculty } = app.services;
    const created = await faculty.addFaculty(facultyInput());

    expect(faculty.getFaculty(created.id)).toEqual({
      id: created.id,
      userId: created.userId,
      firstName: "Marta",
      lastName: "Reyes",
      employeeId: "EMP-101",
      department: "Computer Science",
      specialization: "Compilers",
      phone: "555-201-0101",
      officeLocation: "Hall A 210",
      hireDate: "2016-08-15",
      salary: 78000,
      isActive: true,
    });
    expect(app.services.auth.findUserById(created.userId)?.role).toBe("faculty");
  });

  it("reports every invalid field at once", async () => {
    await expect(
      app.services.faculty.addFaculty(facultyInput({ phone: "12", salary: -5, email: "x" }))
    ).rejects.toMatchObject({
      details: [
        "Email is not a valid email address",
        "Phone must be at least 10 digits",
        "Salary must not be negative",
      ],
    });
  });

  it("leaves no user behind when the profile cannot be stored", async () => {
    const { faculty, auth } = app.services;
    await faculty.addFaculty(facultyInput());

    await expect(
      faculty.addFaculty(facultyInput({ username: "second", email: "second@campus.example" }))
    ).rejects.toBeInstanceOf(DuplicateError);
    expect(auth.listUsers("faculty")).toHaveLength(1);
  });

  it("searches across names, department and employee id", async () => {
    const { faculty } = app.services;
    await faculty.addFaculty(facultyInput());
    await faculty.addFaculty(
      facultyInput({
        username: "lnguyen",
        email: "l.nguyen@campus.example",
        firstName: "Linh",
        lastName: "Nguyen",
        employeeId: "EMP-201",
        department: "Mathematics",
        specialization: "Numerical Analysis",
      })
    );

    expect(faculty.searchFaculty("reyes").map((m) => m.employeeId)).toEqual(["EMP-101"]);
    expect(faculty.searchFaculty("emp-").map((m) => m.employeeId)).toEqual(["EMP-201", "EMP-101"]);
    expect(faculty.getFacultyByDepartment("mathematics")).toHaveLength(1);
    expect(() => faculty.searchFaculty("  ")).toThrow(ValidationError);
  });

  it("updates only the fields given", async () => {
    const { faculty } = app.services;
    const created = await faculty.addFaculty(facultyInput());

    const updated = faculty.updateFaculty(created.id, { officeLocation: "Hall B 1", salary: 80000 });
    expect(updated.officeLocation).toBe("Hall B 1");
    expect(updated.salary).toBe(80000);
    expect(updated.department).toBe("Computer Science");

    expect(() => faculty.updateFaculty(created.id, {})).toThrow(ValidationError);
    expect(() => faculty.updateFaculty(999, { phone: "555-201-9999" })).toThrow(NotFoundError);
  });

  it("keeps class assignments when a member is deactivated", async () => {
    const { faculty, courses, classes } = app.services;
    const member = await faculty.addFaculty(facultyInput());
    const course = courses.createCourse(courseInput());
    const created = classes.addClass(classInput(course.id, member.id));

    faculty.deactivateFaculty(member.id);

    expect(faculty.listFaculty()).toEqual([]);
    expect(faculty.listFaculty({ includeInactive: true })).toHaveLength(1);
    expect(classes.getClass(created.id).facultyId).toBe(member.id);
    expect(faculty.getFacultyClasses(member.id).map((row) => row.classCode)).toEqual(["CS110-A"]);

    faculty.reactivateFaculty(member.id);
    expect(faculty.getFaculty(member.id).isActive).toBe(true);
  });

  it("sums the workload of active classes from their schedules", async () => {
    const { faculty, courses, classes } = app.services;
    const member = await faculty.addFaculty(facultyInput());
    const course = courses.createCourse(courseInput());
    classes.addClass(classInput(course.id, member.id, { schedule: "MWF 09:00-10:00" }));
    classes.addClass(
      classInput(course.id, member.id, { classCode: "CS110-B", schedule: "TTH 10:00-11:30" })
    );
    const parked = classes.addClass(
      classInput(course.id, member.id, { classCode: "CS110-C", schedule: "by arrangement" })
    );
    classes.changeClassStatus(parked.id, "inactive");

    expect(faculty.getFacultyWorkload(member.id)).toEqual({
      facultyId: member.id,
      name: "Marta Reyes",
      employeeId: "EMP-101",
      department: "Computer Science",
      totalClasses: 2,
      totalStudents: 0,
      averageClassSize: 0,
      weeklyHours: 6,
    });
  });

  it("lets faculty read only their own record", async () => {
    const { auth, faculty } = app.services;
    const me = await faculty.addFaculty(facultyInput());
    const other = await faculty.addFaculty(
      facultyInput({ username: "other", email: "o@campus.example", employeeId: "EMP-999" })
    );
    auth.logout();
    await auth.login("mreyes", "test-secret");

    expect(faculty.getMyFacultyRecord().id).toBe(me.id);
    expect(faculty.getFacultyWorkload(me.id).totalClasses).toBe(0);
    expect(() => faculty.getFaculty(other.id)).toThrow(ForbiddenError);
    expect(() => faculty.listFaculty()).toThrow(ForbiddenError);
  });
});
