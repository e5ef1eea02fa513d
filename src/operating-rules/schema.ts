import { Schema } from "effect";

// Field values stay `Unknown` here; each one is validated on its own so a bad
// entry never discards its neighbours.
export const CalendarSectionSchema = Schema.Struct({
  fixed_holidays: Schema.optional(Schema.Unknown),
  movable_holidays: Schema.optional(Schema.Unknown),
});

export const HolidayListSchema = Schema.Array(Schema.Unknown);

export const TariffSectionSchema = Schema.Struct({
  cheaper_night_hours: Schema.optional(Schema.Unknown),
});

export const PvInstallationSectionSchema = Schema.Struct({
  coordinates: Schema.optional(Schema.Unknown),
});

const DefaultTotalPowerSchema = Schema.Struct({
  morning_watts: Schema.optional(Schema.Unknown),
  evening_watts: Schema.optional(Schema.Unknown),
});

export const BoilerSectionSchema = Schema.Struct({
  default_total_power: Schema.optionalWith(DefaultTotalPowerSchema, { default: () => ({}) }),
});
