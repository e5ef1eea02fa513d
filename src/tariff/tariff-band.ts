import type { DayType } from "../calendar/day-type.js";

export type TariffBand = "cheaper" | "more_expensive";

export const DEFAULT_CHEAPER_NIGHT_HOURS = "22:00-06:00";

// Only whole hours matter: the two-rate tariff switches on the hour.
export type HourInterval = {
  readonly startHour: number;
  readonly endHour: number;
};

export type CheaperHoursRule =
  | { readonly _tag: "Interval"; readonly interval: HourInterval }
  | { readonly _tag: "Disabled" }
  | { readonly _tag: "Malformed"; readonly raw: string };

const parseHour = (bound: string): number | null => {
  const hourPart = bound.split(":")[0]?.trim() ?? "";
  if (!/^\d{1,2}$/.test(hourPart)) {
    return null;
  }

  const hour = Number(hourPart);
  return hour <= 24 ? hour : null;
};

const parseInterval = (raw: string): CheaperHoursRule => {
  const bounds = raw.split("-");
  const startHour = bounds.length >= 2 ? parseHour(bounds[0] ?? "") : null;
  const endHour = bounds.length >= 2 ? parseHour(bounds[1] ?? "") : null;

  if (startHour === null || endHour === null) {
    return { _tag: "Malformed", raw };
  }

  return { _tag: "Interval", interval: { startHour, endHour } };
};

/**
 * Parses `tariff_g12w.cheaper_night_hours`. A missing value means the
 * default night band, `null` or an empty string switches the band off.
 */
export const parseCheaperHours = (raw: unknown): CheaperHoursRule => {
  if (raw === undefined) {
    return parseInterval(DEFAULT_CHEAPER_NIGHT_HOURS);
  }
  if (raw === null || raw === "") {
    return { _tag: "Disabled" };
  }
  if (typeof raw !== "string") {
    return { _tag: "Malformed", raw: JSON.stringify(raw) };
  }

  return parseInterval(raw);
};

export const isWithinHourInterval = (hour: number, { startHour, endHour }: HourInterval): boolean => {
  // e.g. 22-06 wraps past midnight
  if (startHour > endHour) {
    return hour >= startHour || hour < endHour;
  }

  return startHour <= hour && hour < endHour;
};

export const tariffFor = (dayType: DayType, hour: number, rule: CheaperHoursRule): TariffBand => {
  if (dayType === "sunday_or_holiday") {
    return "cheaper";
  }

  if (rule._tag === "Interval" && isWithinHourInterval(hour, rule.interval)) {
    return "cheaper";
  }

  return "more_expensive";
};
