import { Effect, Option, Predicate, Schema } from "effect";
import type { ConfigDocumentContent } from "../config-store/types.js";
import { EMPTY_HOLIDAY_CALENDAR, type HolidayCalendar } from "../calendar/day-type.js";
import { parseCheaperHours, type CheaperHoursRule } from "../tariff/tariff-band.js";
import { DEFAULT_COORDINATES, parseCoordinates, type Coordinates } from "./coordinates.js";
import {
  BoilerSectionSchema,
  CalendarSectionSchema,
  HolidayListSchema,
  PvInstallationSectionSchema,
  TariffSectionSchema,
} from "./schema.js";

export { DEFAULT_COORDINATES, parseCoordinates, type Coordinates } from "./coordinates.js";

export type BoilerDefaults = {
  readonly morningWatts: number;
  readonly eveningWatts: number;
};

export const DEFAULT_BOILER_DEFAULTS: BoilerDefaults = { morningWatts: 0, eveningWatts: 0 };

/** Rules derived from `system_config`, parsed once per configuration reload. */
export type OperatingRules = {
  readonly holidays: HolidayCalendar;
  readonly cheaperHours: CheaperHoursRule;
  readonly coordinates: Coordinates;
  readonly boilerDefaults: BoilerDefaults;
};

export const DEFAULT_OPERATING_RULES: OperatingRules = {
  holidays: EMPTY_HOLIDAY_CALENDAR,
  cheaperHours: parseCheaperHours(undefined),
  coordinates: DEFAULT_COORDINATES,
  boilerDefaults: DEFAULT_BOILER_DEFAULTS,
};

const readSection = <A, I>(
  systemConfig: ConfigDocumentContent | null,
  key: string,
  schema: Schema.Schema<A, I>
): Effect.Effect<Option.Option<A>> =>
  Effect.gen(function* () {
    const raw = systemConfig?.[key];
    if (raw === undefined) {
      return Option.none();
    }

    const decoded = Schema.decodeUnknownOption(schema)(raw);
    if (Option.isNone(decoded)) {
      yield* Effect.logWarning(`Ignoring malformed "${key}" section in system configuration`);
    }

    return decoded;
  });

const holidayList = (raw: unknown, field: string): Effect.Effect<readonly string[]> => {
  if (raw === undefined || raw === null) {
    return Effect.succeed([]);
  }

  return Option.match(Schema.decodeUnknownOption(HolidayListSchema)(raw), {
    onNone: () =>
      Effect.logWarning(`Ignoring calendar.${field}: expected a list of dates`).pipe(Effect.as([])),
    onSome: (entries) => {
      const dates = entries.filter(Predicate.isString);
      if (dates.length === entries.length) {
        return Effect.succeed(dates);
      }

      return Effect.logWarning(`Ignoring non-text entries in calendar.${field}`, {
        ignored: entries.length - dates.length,
      }).pipe(Effect.as(dates));
    },
  });
};

const wattage = (raw: unknown, field: string): Effect.Effect<number> => {
  if (raw === undefined) {
    return Effect.succeed(0);
  }
  if (Predicate.isNumber(raw) && Number.isFinite(raw)) {
    return Effect.succeed(raw);
  }

  return Effect.logWarning(`Malformed boiler.default_total_power.${field}, using 0 W`, {
    value: raw,
  }).pipe(Effect.as(0));
};

const resolveCoordinates = (raw: unknown): Effect.Effect<Coordinates> => {
  if (raw === undefined || raw === null) {
    return Effect.succeed(DEFAULT_COORDINATES);
  }

  const parsed = typeof raw === "string" ? parseCoordinates(raw) : null;
  if (parsed !== null) {
    return Effect.succeed(parsed);
  }

  return Effect.logWarning("Malformed PV installation coordinates, using default location", {
    coordinates: raw,
    fallback: DEFAULT_COORDINATES,
  }).pipe(Effect.as(DEFAULT_COORDINATES));
};

export const deriveOperatingRules = (
  systemConfig: ConfigDocumentContent | null
): Effect.Effect<OperatingRules> =>
  Effect.gen(function* () {
    const calendar = yield* readSection(systemConfig, "calendar", CalendarSectionSchema);
    const tariff = yield* readSection(systemConfig, "tariff_g12w", TariffSectionSchema);
    const pvInstallation = yield* readSection(systemConfig, "pv_installation", PvInstallationSectionSchema);
    const boiler = yield* readSection(systemConfig, "boiler", BoilerSectionSchema);

    const calendarSection = Option.getOrUndefined(calendar);
    const holidays: HolidayCalendar = calendarSection === undefined
      ? EMPTY_HOLIDAY_CALENDAR
      : {
          fixed: new Set(yield* holidayList(calendarSection.fixed_holidays, "fixed_holidays")),
          movable: new Set(yield* holidayList(calendarSection.movable_holidays, "movable_holidays")),
        };

    const cheaperHours = parseCheaperHours(
      Option.getOrUndefined(tariff)?.cheaper_night_hours
    );

    const coordinates = yield* resolveCoordinates(
      Option.getOrUndefined(pvInstallation)?.coordinates
    );

    const totalPower = Option.getOrUndefined(boiler)?.default_total_power;
    const boilerDefaults: BoilerDefaults = totalPower === undefined
      ? DEFAULT_BOILER_DEFAULTS
      : {
          morningWatts: yield* wattage(totalPower.morning_watts, "morning_watts"),
          eveningWatts: yield* wattage(totalPower.evening_watts, "evening_watts"),
        };

    return { holidays, cheaperHours, coordinates, boilerDefaults };
  });
