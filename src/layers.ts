import { Effect, Layer } from "effect";
import { AppConfig } from "./config.js";
import { JsonFileConfigStoreLayer } from "./config-store/json-file.config-store.js";
import { SunTimesWindowResolverLayer } from "./solar-window/sun-times.window-resolver.js";
import { StatusResolverLayer } from "./status-resolver/index.js";

export type ServiceConfig = {
  readonly configDirectory: string;
  readonly timeZone: string;
  readonly locale: string;
};

export const createServiceLayers = (config: ServiceConfig) =>
  StatusResolverLayer({ timeZone: config.timeZone, locale: config.locale }).pipe(
    Layer.provideMerge(JsonFileConfigStoreLayer({ directory: config.configDirectory })),
    Layer.provideMerge(SunTimesWindowResolverLayer),
  );

export const serviceLayers = Layer.unwrapEffect(
  Effect.gen(function* () {
    return createServiceLayers({
      configDirectory: yield* AppConfig.configStore.directory,
      timeZone: yield* AppConfig.status.timeZone,
      locale: yield* AppConfig.status.locale,
    });
  })
);
