import { Context, type Effect } from "effect";
import type { DayType } from "../calendar/day-type.js";
import type { TariffBand } from "../tariff/tariff-band.js";
import type { WindowId } from "../solar-window/types.js";
import type { ConfigDocumentContent, ConfigDocumentName, ConfigStatus } from "../config-store/types.js";

export type OperatingFlags = {
  readonly boilerFromFurnaceEnabled: boolean;
  readonly heatersLocked: boolean;
};

export const INITIAL_OPERATING_FLAGS: OperatingFlags = {
  boilerFromFurnaceEnabled: true,
  heatersLocked: true,
};

export type SystemStatus = {
  readonly timestamp: string; // ISO 8601
  readonly dateLabel: string;
  readonly weekday: string;
  readonly time: string; // HH:MM:SS, local
  readonly lastUpdate: string; // HH:MM:SS, local clock when the snapshot was computed
  readonly dayType: DayType;
  readonly window: WindowId;
  readonly tariff: TariffBand;
  readonly boilerFromFurnaceEnabled: boolean;
  readonly heatersLocked: boolean;
  readonly systemActive: boolean;
  readonly configLoaded: boolean;
  readonly filesLoaded: Readonly<Record<ConfigDocumentName, boolean>>;
  readonly profilesAvailable: readonly string[];
  readonly boilerMorningPowerW: number;
  readonly boilerEveningPowerW: number;
};

export type ConfigSnapshot = {
  readonly energyProfiles: ConfigDocumentContent | null;
  readonly cwuSchedule: ConfigDocumentContent | null;
  readonly systemConfig: ConfigDocumentContent | null;
  readonly userCorrections: ConfigDocumentContent | null;
  readonly configStatus: ConfigStatus;
};

export type ToggleAck = {
  readonly status: "success";
  readonly boilerFromFurnaceEnabled: boolean;
  readonly heatersLocked: boolean;
};

export class StatusResolver extends Context.Tag("StatusResolver")<
  StatusResolver,
  {
    readonly refresh: () => Effect.Effect<void>;
    readonly getStatus: () => Effect.Effect<SystemStatus>;
    readonly getConfigSnapshot: () => Effect.Effect<ConfigSnapshot>;
    readonly toggleBoilerFromFurnace: (enabled: boolean) => Effect.Effect<ToggleAck>;
    readonly computeStatus: (at: Date) => Effect.Effect<SystemStatus>;
    readonly classifyDay: (at: Date) => Effect.Effect<DayType>;
    readonly classifyTariff: (at: Date) => Effect.Effect<TariffBand>;
    readonly resolveWindow: (at: Date) => Effect.Effect<WindowId>;
  }
>() {}

