// src/services/facultyService.ts
import { and, asc, eq } from "drizzle-orm";
import { classes, faculty, users } from "../db/schema";
import type {
  ClassDetails,
  Faculty,
  FacultyInput,
  FacultyUpdate,
  FacultyWorkload,
} from "../types/models";
import { ForbiddenError, NotFoundError, ValidationError, translateDbError } from "../utils/errors";
import { fullName, hasChanges, includesIgnoreCase, today } from "../utils/helpers";
import { FieldChecks } from "../utils/validation";
import { BaseService } from "./baseService";

export class FacultyService extends BaseService {
  validateFaculty(input: FacultyUpdate, checks = new FieldChecks()): FieldChecks {
    const textFields: [string, string | undefined][] = [
      ["First name", input.firstName],
      ["Last name", input.lastName],
      ["Employee ID", input.employeeId],
      ["Department", input.department],
      ["Specialization", input.specialization],
      ["Phone", input.phone],
      ["Office location", input.officeLocation],
    ];
    for (const [label, value] of textFields) {
      if (value !== undefined) checks.required(label, value);
    }
    return checks
      .phone("Phone", input.phone)
      .nonNegative("Salary", input.salary)
      .date("Hire date", input.hireDate);
  }

  /** Creates the login account and the faculty profile together. */
  async addFaculty(input: FacultyInput): Promise<Faculty> {
    this.requireRole("admin");
    const checks = this.auth.validateAccount(input);
    this.validateFaculty(input, checks)
      .required("First name", input.firstName)
      .required("Last name", input.lastName)
      .required("Employee ID", input.employeeId)
      .required("Department", input.department)
      .required("Specialization", input.specialization)
      .required("Phone", input.phone)
      .required("Office location", input.officeLocation)
      .assertValid("Invalid faculty data");

    const passwordHash = await this.auth.hashPassword(input.password);

    try {
      const created = this.db.transaction((tx) => {
        const user = this.auth.insertUser(
          tx,
          { username: input.username, email: input.email, passwordHash },
          "faculty"
        );
        return tx
          .insert(faculty)
          .values({
            userId: user.id,
            firstName: input.firstName.trim(),
            lastName: input.lastName.trim(),
            employeeId: input.employeeId.trim(),
            department: input.department.trim(),
            specialization: input.specialization.trim(),
            phone: input.phone.trim(),
            officeLocation: input.officeLocation.trim(),
            hireDate: input.hireDate ?? today(),
            salary: input.salary,
          })
          .returning()
          .get();
      });
      console.log(`[faculty] added ${fullName(created)} (${created.employeeId})`);
      return created;
    } catch (error) {
      throw translateDbError(error, "faculty member");
    }
  }

  listFaculty(options: { includeInactive?: boolean } = {}): Faculty[] {
    this.requireRole("admin");
    const query = this.db.select().from(faculty);
    const rows = options.includeInactive
      ? query.orderBy(asc(faculty.lastName), asc(faculty.firstName)).all()
      : query
          .where(eq(faculty.isActive, true))
          .orderBy(asc(faculty.lastName), asc(faculty.firstName))
          .all();
    return rows;
  }

  /** Also returns deactivated members; callers decide whether that matters. */
  getFaculty(id: number): Faculty {
    const session = this.requireRole("admin", "faculty");
    const member = this.getFacultyRow(id);
    if (!member) throw new NotFoundError("Faculty member", id);
    if (session.role === "faculty" && member.userId !== session.userId) {
      throw new ForbiddenError("You can only view your own faculty record.");
    }
    return member;
  }

  searchFaculty(term: string): Faculty[] {
    const needle = term.trim();
    if (!needle) throw new ValidationError("Search term cannot be empty.");
    return this.listFaculty().filter(
      (member) =>
        includesIgnoreCase(member.firstName, needle) ||
        includesIgnoreCase(member.lastName, needle) ||
        includesIgnoreCase(member.department, needle) ||
        includesIgnoreCase(member.specialization, needle) ||
        includesIgnoreCase(member.employeeId, needle)
    );
  }

  getFacultyByDepartment(department: string): Faculty[] {
    const wanted = department.trim().toLowerCase();
    return this.listFaculty().filter((member) => member.department.toLowerCase() === wanted);
  }

  updateFaculty(id: number, patch: FacultyUpdate): Faculty {
    this.requireRole("admin");
    if (!hasChanges(patch)) throw new ValidationError("No data to update.");
    this.validateFaculty(patch).assertValid("Invalid faculty data");

    try {
      const updated = this.db
        .update(faculty)
        .set({
          firstName: patch.firstName?.trim(),
          lastName: patch.lastName?.trim(),
          employeeId: patch.employeeId?.trim(),
          department: patch.department?.trim(),
          specialization: patch.specialization?.trim(),
          phone: patch.phone?.trim(),
          officeLocation: patch.officeLocation?.trim(),
          hireDate: patch.hireDate,
          salary: patch.salary,
        })
        .where(eq(faculty.id, id))
        .returning()
        .get();
      if (!updated) throw new NotFoundError("Faculty member", id);
      return updated;
    } catch (error) {
      throw translateDbError(error, "faculty member");
    }
  }

  /**
   * Flags the member and their login inactive. Their classes keep pointing at
   * them so past teaching assignments stay on record.
   */
  deactivateFaculty(id: number): void {
    this.setActive(id, false);
  }

  reactivateFaculty(id: number): void {
    this.setActive(id, true);
  }

  private setActive(id: number, isActive: boolean): void {
    this.requireRole("admin");
    const member = this.getFacultyRow(id);
    if (!member) throw new NotFoundError("Faculty member", id);

    this.db.transaction((tx) => {
      tx.update(faculty).set({ isActive }).where(eq(faculty.id, id)).run();
      tx.update(users).set({ isActive }).where(eq(users.id, member.userId)).run();
    });
    console.log(`[faculty] ${isActive ? "reactivated" : "deactivated"} ${fullName(member)}`);
  }

  getFacultyClasses(id: number): ClassDetails[] {
    this.getFaculty(id);
    return this.listClassDetails().filter((row) => row.facultyId === id);
  }

  /** Active classes only; weekly hours come from each class's schedule. */
  getFacultyWorkload(id: number): FacultyWorkload {
    const member = this.getFaculty(id);
    const active = this.db
      .select()
      .from(classes)
      .where(and(eq(classes.facultyId, id), eq(classes.status, "active")))
      .all();

    return this.buildWorkload(member, active);
  }

  /** The faculty record of the logged-in faculty member. */
  getMyFacultyRecord(): Faculty {
    const session = this.requireRole("faculty");
    const member = this.sessionFaculty(session);
    if (!member) throw new NotFoundError("Faculty profile for this account");
    return member;
  }
}
