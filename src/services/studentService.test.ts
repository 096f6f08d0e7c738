import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DuplicateError, ForbiddenError, ValidationError } from "../utils/errors";
import {
  classInput,
  createTestApp,
  facultyInput,
  seedClass,
  seedStudents,
  studentInput,
  type TestApp,
} from "../test/helpers";

describe("StudentService", () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(() => app.handle.close());

  it("adds a student with a linked login", async () => {
    const student = await app.services.students.addStudent(studentInput({ firstName: " Ana " }));
    expect(student).toMatchObject({
      firstName: "Ana",
      studentNumber: "STU-0001",
      yearLevel: 1,
      enrollmentDate: "2024-08-26",
      isActive: true,
    });

    app.services.auth.logout();
    const session = await app.services.auth.login("ana.silva", "test-secret");
    expect(session.role).toBe("student");
    expect(app.services.students.getMyStudentRecord().id).toBe(student.id);
  });

  it("validates year level and phone, and keeps student numbers unique", async () => {
    const { students } = app.services;
    await expect(
      students.addStudent(studentInput({ yearLevel: 5, phone: "555" }))
    ).rejects.toMatchObject({
      details: ["Year level must be between 1 and 4", "Phone must be at least 10 digits"],
    });

    await students.addStudent(studentInput());
    await expect(
      students.addStudent(studentInput({ username: "ana2", email: "ana2@student.example" }))
    ).rejects.toThrow(DuplicateError);
  });

  it("searches and filters by major and year", async () => {
    const { students } = app.services;
    await seedStudents(app.services, 2);
    await students.addStudent(
      studentInput({
        username: "chloe",
        email: "chloe@student.example",
        firstName: "Chloe",
        lastName: "Ito",
        studentNumber: "STU-0100",
        major: "Mathematics",
        yearLevel: 2,
      })
    );

    expect(students.searchStudents("ito").map((s) => s.studentNumber)).toEqual(["STU-0100"]);
    expect(students.getStudentsByMajor("computer science")).toHaveLength(2);
    expect(students.getStudentsByYear(2).map((s) => s.lastName)).toEqual(["Ito"]);
    expect(() => students.getStudentsByYear(5)).toThrow(ValidationError);
  });

  it("hides deactivated students unless asked", async () => {
    const { students } = app.services;
    const [first] = await seedStudents(app.services, 2);
    students.deactivateStudent(first.id);

    expect(students.listStudents()).toHaveLength(1);
    expect(students.listStudents({ includeInactive: true })).toHaveLength(2);

    students.reactivateStudent(first.id);
    expect(students.listStudents()).toHaveLength(2);
  });

  it("lists current enrollments and classes with free seats", async () => {
    const { course, member, classRow } = await seedClass(app.services);
    const { classes, students } = app.services;
    const full = classes.addClass(classInput(course.id, member.id, { classCode: "CS110-B", capacity: 1 }));
    const open = classes.addClass(classInput(course.id, member.id, { classCode: "CS110-C" }));
    const [me, other] = await seedStudents(app.services, 2);

    students.enrollStudentInClass(me.id, classRow.id);
    students.enrollStudentInClass(other.id, full.id);

    expect(students.getStudentEnrollments(me.id)).toEqual([
      expect.objectContaining({
        classCode: "CS110-A",
        courseTitle: "Programming Fundamentals",
        facultyName: "Marta Reyes",
        status: "enrolled",
        grade: null,
      }),
    ]);
    expect(students.getAvailableClasses(me.id)).toEqual([
      expect.objectContaining({ classId: open.id, classCode: "CS110-C", availableSeats: 30 }),
    ]);

    students.dropStudentFromClass(me.id, classRow.id);
    expect(students.getStudentEnrollments(me.id)).toEqual([]);
    expect(students.getAvailableClasses(me.id).map((row) => row.classCode)).toEqual([
      "CS110-A",
      "CS110-C",
    ]);
  });

  it("keeps the login email in step with the student record", async () => {
    const { auth, students } = app.services;
    const student = await students.addStudent(studentInput());

    const updated = students.updateStudent(student.id, { email: " ana.new@student.example " });
    expect(updated.email).toBe("ana.new@student.example");
    expect(auth.findUserById(student.userId)?.email).toBe("ana.new@student.example");
  });

  it("refuses an email that another account already uses", async () => {
    const { auth, students } = app.services;
    const [first, second] = await seedStudents(app.services, 2);

    expect(() =>
      students.updateStudent(second.id, { email: "student1@student.example", major: "Physics" })
    ).toThrow(DuplicateError);
    expect(students.getStudent(second.id).email).toBe("student2@student.example");
    expect(students.getStudent(second.id).major).toBe("Computer Science");
    expect(auth.findUserById(second.userId)?.email).toBe("student2@student.example");
    expect(auth.findUserById(first.userId)?.email).toBe("student1@student.example");
  });

  it("lets a student read only their own record", async () => {
    const [me, other] = await seedStudents(app.services, 2);
    const { auth, students, faculty } = app.services;
    await faculty.addFaculty(facultyInput());

    auth.logout();
    await auth.login("student1", "test-secret");
    expect(students.getStudent(me.id).studentNumber).toBe("STU-0001");
    expect(students.getStudentEnrollments(me.id)).toEqual([]);
    expect(() => students.getStudent(other.id)).toThrow(ForbiddenError);
    expect(() => students.listStudents()).toThrow(ForbiddenError);

    auth.logout();
    await auth.login("mreyes", "test-secret");
    expect(() => students.getStudent(me.id)).toThrow(ForbiddenError);
  });
});
