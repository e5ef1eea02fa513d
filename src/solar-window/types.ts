import { Context, type Effect } from "effect";

// Opaque to the status resolver: whatever the resolver returns is reported as-is.
export type WindowId = string;

export class WindowResolver extends Context.Tag("WindowResolver")<
  WindowResolver,
  {
    readonly resolveWindow: (latitude: number, longitude: number, at: Date) => Effect.Effect<WindowId>;
  }
>() {}

export type IWindowResolver = Context.Tag.Service<typeof WindowResolver>;

export type SunTimes = {
  readonly sunrise: number; // fractional UTC hours, may fall outside 0-24
  readonly sunset: number;
  readonly solarNoon: number;
};

export type SolarWindow = "pre_solar" | "solar" | "post_solar";
