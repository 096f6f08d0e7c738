// src/utils/schedule.ts

export type Weekday = "Mon" | "Tue" | "Wed" | "Thu" | "Fri" | "Sat" | "Sun";

export interface ParsedSchedule {
  days: Weekday[];
  startMinutes: number;
  endMinutes: number;
  weeklyHours: number;
}

const SCHEDULE_PATTERN = /^\s*([A-Za-z]+)\s+(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})\s*$/;

// Two-letter tokens are listed first so "TH" is not read as "T" + "H".
const DAY_TOKENS: [string, Weekday][] = [
  ["TH", "Thu"],
  ["SA", "Sat"],
  ["SU", "Sun"],
  ["M", "Mon"],
  ["T", "Tue"],
  ["W", "Wed"],
  ["R", "Thu"],
  ["F", "Fri"],
];

const parseDays = (raw: string): Weekday[] | null => {
  const days: Weekday[] = [];
  let rest = raw.toUpperCase();
  while (rest.length > 0) {
    const match = DAY_TOKENS.find(([token]) => rest.startsWith(token));
    if (!match) return null;
    if (!days.includes(match[1])) days.push(match[1]);
    rest = rest.slice(match[0].length);
  }
  return days;
};

const toMinutes = (hours: string, minutes: string): number | null => {
  const h = Number(hours);
  const m = Number(minutes);
  if (h > 23 || m > 59) return null;
  return h * 60 + m;
};

/**
 * Parses schedules such as "MWF 10:00-11:00" or "TTH 09:30-10:45".
 * Returns null when the text does not follow that shape.
 */
export const parseSchedule = (schedule: string): ParsedSchedule | null => {
  const match = SCHEDULE_PATTERN.exec(schedule);
  if (!match) return null;

  const days = parseDays(match[1]);
  const startMinutes = toMinutes(match[2], match[3]);
  const endMinutes = toMinutes(match[4], match[5]);
  if (!days || startMinutes === null || endMinutes === null || endMinutes <= startMinutes) {
    return null;
  }

  const weeklyHours = Math.round(((days.length * (endMinutes - startMinutes)) / 60) * 100) / 100;
  return { days, startMinutes, endMinutes, weeklyHours };
};

export const weeklyHours = (schedule: string, fallbackHours: number): number =>
  parseSchedule(schedule)?.weeklyHours ?? fallbackHours;
