import { Clock, Effect, Layer, Predicate } from "effect";
import { ConfigStore, type ConfigDocumentContent } from "../config-store/types.js";
import { WindowResolver } from "../solar-window/types.js";
import { classifyDay } from "../calendar/day-type.js";
import { clockLabel, makeLocalTimeReader, type InvalidTimeZoneError } from "../calendar/local-time.js";
import { tariffFor } from "../tariff/tariff-band.js";
import { DEFAULT_OPERATING_RULES, deriveOperatingRules, type OperatingRules } from "../operating-rules/index.js";
import type { IEventLogger } from "../event-logger/types.js";
import { EventLogger } from "../event-logger/index.js";
import {
  INITIAL_OPERATING_FLAGS,
  StatusResolver,
  type ConfigSnapshot,
  type OperatingFlags,
  type SystemStatus,
} from "./types.js";

export type { SystemStatus, ConfigSnapshot, OperatingFlags, ToggleAck } from "./types.js";

export type StatusResolverConfig = {
  readonly timeZone: string;
  readonly locale: string;
  readonly initialFlags?: OperatingFlags;
};

export const profileKeysOf = (energyProfiles: ConfigDocumentContent | null): readonly string[] => {
  const profiles = energyProfiles?.["energy_profiles"];
  return Predicate.isRecord(profiles) ? Object.keys(profiles) : [];
};

export const StatusResolverLayer = (
  config: StatusResolverConfig,
  eventLogger: IEventLogger = new EventLogger()
): Layer.Layer<StatusResolver, InvalidTimeZoneError, ConfigStore | WindowResolver> =>
  Layer.effect(
    StatusResolver,
    Effect.gen(function* () {
      const configStore = yield* ConfigStore;
      const windowResolver = yield* WindowResolver;
      const localTime = yield* makeLocalTimeReader(config.timeZone, config.locale);
      const lock = yield* Effect.makeSemaphore(1);

      let rules: OperatingRules = DEFAULT_OPERATING_RULES;
      let flags: OperatingFlags = config.initialFlags ?? INITIAL_OPERATING_FLAGS;
      let configView: ConfigSnapshot = {
        energyProfiles: null,
        cwuSchedule: null,
        systemConfig: null,
        userCorrections: null,
        configStatus: yield* configStore.getStatus(),
      };

      const loadConfigView = () =>
        Effect.gen(function* () {
          configView = {
            energyProfiles: yield* configStore.getEnergyProfiles(),
            cwuSchedule: yield* configStore.getCwuSchedule(),
            systemConfig: yield* configStore.getSystemConfig(),
            userCorrections: yield* configStore.getUserCorrections(),
            configStatus: yield* configStore.getStatus(),
          };
          rules = yield* deriveOperatingRules(configView.systemConfig);

          const profiles = profileKeysOf(configView.energyProfiles);
          if (profiles.length > 0) {
            yield* Effect.logInfo("Loaded energy profiles", { profiles });
          }
        });

      const classifyDayAt = (at: Date) =>
        Effect.sync(() => classifyDay(localTime.read(at), rules.holidays));

      const classifyTariffAt = (at: Date) =>
        Effect.gen(function* () {
          const local = localTime.read(at);
          const dayType = classifyDay(local, rules.holidays);
          const { cheaperHours } = rules;

          if (dayType !== "sunday_or_holiday" && cheaperHours._tag === "Malformed") {
            yield* Effect.logWarning(`Malformed cheaper night hours: ${cheaperHours.raw}`);
          }

          return tariffFor(dayType, local.hour, cheaperHours);
        });

      const resolveWindowAt = (at: Date) =>
        windowResolver.resolveWindow(rules.coordinates.latitude, rules.coordinates.longitude, at);

      const computeStatus = (at: Date): Effect.Effect<SystemStatus> =>
        Effect.gen(function* () {
          const local = localTime.read(at);
          const computedAt = new Date(yield* Clock.currentTimeMillis);
          const { boilerDefaults } = rules;

          return {
            timestamp: at.toISOString(),
            dateLabel: localTime.dateLabel(at),
            weekday: localTime.weekdayName(at),
            time: clockLabel(local),
            lastUpdate: clockLabel(localTime.read(computedAt)),
            dayType: classifyDay(local, rules.holidays),
            window: yield* resolveWindowAt(at),
            tariff: yield* classifyTariffAt(at),
            boilerFromFurnaceEnabled: flags.boilerFromFurnaceEnabled,
            heatersLocked: flags.heatersLocked,
            systemActive: true,
            configLoaded: configView.energyProfiles !== null,
            filesLoaded: configView.configStatus.filesLoaded,
            profilesAvailable: profileKeysOf(configView.energyProfiles),
            boilerMorningPowerW: boilerDefaults.morningWatts,
            boilerEveningPowerW: boilerDefaults.eveningWatts,
          };
        });

      const computeNow = () =>
        Clock.currentTimeMillis.pipe(Effect.flatMap((nowMs) => computeStatus(new Date(nowMs))));

      yield* loadConfigView();
      let status: SystemStatus = yield* computeNow();

      const updateStatus = () =>
        computeNow().pipe(
          Effect.tap((next) => {
            status = next;
          })
        );

      const refresh = () =>
        lock.withPermits(1)(
          Effect.gen(function* () {
            const allDocumentsLoaded = yield* configStore.reloadAll();
            yield* loadConfigView();
            yield* updateStatus();
            yield* eventLogger.onRefreshed(allDocumentsLoaded);
          })
        ).pipe(Effect.withSpan("StatusResolver.refresh"));

      const toggleBoilerFromFurnace = (enabled: boolean) =>
        lock.withPermits(1)(
          Effect.gen(function* () {
            // Enabling the furnace feed always locks the heaters; disabling leaves them as they are.
            flags = {
              boilerFromFurnaceEnabled: enabled,
              heatersLocked: enabled ? true : flags.heatersLocked,
            };

            if (enabled) {
              yield* eventLogger.onBoilerFromFurnaceEnabled();
            } else {
              yield* eventLogger.onBoilerFromFurnaceDisabled(flags.heatersLocked);
            }

            yield* updateStatus();

            return {
              status: "success" as const,
              boilerFromFurnaceEnabled: flags.boilerFromFurnaceEnabled,
              heatersLocked: flags.heatersLocked,
            };
          })
        );

      return StatusResolver.of({
        refresh,
        getStatus: () => Effect.sync(() => status),
        // callers get their own copy of the cached documents
        getConfigSnapshot: () => Effect.sync(() => structuredClone(configView)),
        toggleBoilerFromFurnace,
        computeStatus,
        classifyDay: classifyDayAt,
        classifyTariff: classifyTariffAt,
        resolveWindow: resolveWindowAt,
      });
    })
  );
