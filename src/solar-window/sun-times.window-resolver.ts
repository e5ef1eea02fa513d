import { Effect, Layer } from "effect";
import { WindowResolver } from "./types.js";
import { solarWindowAt } from "./solar-calculations.js";

export const SunTimesWindowResolverLayer = Layer.succeed(
  WindowResolver,
  WindowResolver.of({
    resolveWindow: (latitude, longitude, at) =>
      Effect.sync(() => solarWindowAt(at, latitude, longitude)),
  })
);
