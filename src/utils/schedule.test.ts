import { describe, expect, it } from "vitest";
import { parseSchedule, weeklyHours } from "./schedule";

describe("parseSchedule", () => {
  it("reads single-letter day codes", () => {
    expect(parseSchedule("MWF 09:00-10:00")).toEqual({
      days: ["Mon", "Wed", "Fri"],
      startMinutes: 540,
      endMinutes: 600,
      weeklyHours: 3,
    });
  });

  it("reads TH as Thursday rather than Tuesday plus H", () => {
    const parsed = parseSchedule("TTH 10:00-11:30");
    expect(parsed?.days).toEqual(["Tue", "Thu"]);
    expect(parsed?.weeklyHours).toBe(3);
  });

  it("accepts R for Thursday and lower case", () => {
    expect(parseSchedule("tr 14:00-15:15")?.weeklyHours).toBe(2.5);
  });

  it("counts a repeated day once", () => {
    expect(parseSchedule("MM 08:00-09:00")?.days).toEqual(["Mon"]);
  });

  it.each(["TBA", "MWF", "MWF 10:00", "XYZ 09:00-10:00", "M 11:00-10:00", "M 25:00-26:00"])(
    "rejects %s",
    (text) => {
      expect(parseSchedule(text)).toBeNull();
    }
  );
});

describe("weeklyHours", () => {
  it("uses the parsed hours when the schedule is readable", () => {
    expect(weeklyHours("MW 13:00-14:30", 3)).toBe(3);
  });

  it("falls back when it is not", () => {
    expect(weeklyHours("by arrangement", 3)).toBe(3);
    expect(weeklyHours("by arrangement", 4.5)).toBe(4.5);
  });
});
