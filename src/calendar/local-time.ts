import { Data, DateTime, Effect } from "effect";

export type LocalTime = {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
  readonly hour: number; // 0-23
  readonly minute: number;
  readonly second: number;
  readonly weekday: number; // 1 = Monday ... 7 = Sunday
};

export class InvalidTimeZoneError extends Data.TaggedError("InvalidTimeZone")<{
  readonly timeZone: string;
  readonly message: string;
}> {}

export type LocalTimeReader = {
  readonly read: (at: Date) => LocalTime;
  readonly weekdayName: (at: Date) => string;
  readonly dateLabel: (at: Date) => string;
};

/**
 * Resolves the named zone once; every reading converts the instant into
 * that zone, so calendar fields follow its daylight saving rules.
 */
export const makeLocalTimeReader = (
  timeZone: string,
  locale: string
): Effect.Effect<LocalTimeReader, InvalidTimeZoneError> =>
  DateTime.zoneMakeNamedEffect(timeZone).pipe(
    Effect.mapError(
      (cause) =>
        new InvalidTimeZoneError({
          timeZone,
          message: `Unsupported time zone ${timeZone}: ${cause.message}`,
        })
    ),
    Effect.map((zone): LocalTimeReader => {
      const zoned = (at: Date) => DateTime.unsafeMakeZoned(at, { timeZone: zone });

      return {
        read: (at) => {
          const parts = DateTime.toParts(zoned(at));
          return {
            year: parts.year,
            month: parts.month,
            day: parts.day,
            hour: parts.hours,
            minute: parts.minutes,
            second: parts.seconds,
            // DateTime counts weekdays from Sunday = 0
            weekday: parts.weekDay === 0 ? 7 : parts.weekDay,
          };
        },
        weekdayName: (at) => DateTime.format(zoned(at), { locale, weekday: "long" }),
        dateLabel: (at) =>
          DateTime.format(zoned(at), {
            locale,
            weekday: "long",
            day: "2-digit",
            month: "long",
            year: "numeric",
          }),
      };
    })
  );

const pad = (value: number): string => String(value).padStart(2, "0");

export const monthDayKey = (local: LocalTime): string => `${pad(local.month)}-${pad(local.day)}`;

export const isoDateKey = (local: LocalTime): string =>
  `${local.year}-${pad(local.month)}-${pad(local.day)}`;

export const clockLabel = (local: LocalTime): string =>
  `${pad(local.hour)}:${pad(local.minute)}:${pad(local.second)}`;
