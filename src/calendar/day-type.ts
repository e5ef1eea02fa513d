import { monthDayKey, isoDateKey, type LocalTime } from "./local-time.js";

export type DayType = "workday" | "saturday" | "sunday_or_holiday";

export type HolidayCalendar = {
  readonly fixed: ReadonlySet<string>; // "MM-DD"
  readonly movable: ReadonlySet<string>; // "YYYY-MM-DD"
};

export const EMPTY_HOLIDAY_CALENDAR: HolidayCalendar = {
  fixed: new Set(),
  movable: new Set(),
};

export const isHoliday = (local: LocalTime, calendar: HolidayCalendar): boolean =>
  calendar.fixed.has(monthDayKey(local)) || calendar.movable.has(isoDateKey(local));

// Holidays are billed and scheduled like Sundays.
export const classifyDay = (local: LocalTime, calendar: HolidayCalendar): DayType => {
  if (isHoliday(local, calendar)) {
    return "sunday_or_holiday";
  }

  if (local.weekday <= 5) {
    return "workday";
  }

  return local.weekday === 6 ? "saturday" : "sunday_or_holiday";
};
