import { Config as EffectConfig } from "effect";


export const AppConfig = {
  configStore: {
    directory: EffectConfig.string("CONFIG_DIR").pipe(
      EffectConfig.withDefault("config")
    ),
  },

  status: {
    timeZone: EffectConfig.string("TIME_ZONE").pipe(
      EffectConfig.withDefault("Europe/Warsaw")
    ),
    locale: EffectConfig.string("LOCALE").pipe(
      EffectConfig.withDefault("pl-PL")
    ),
    refreshIntervalSeconds: EffectConfig.integer("REFRESH_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(60)
    ),
  },
};
