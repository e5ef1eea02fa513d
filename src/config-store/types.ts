import { Context, Schema, type Effect } from "effect";
import type { DayType } from "../calendar/day-type.js";

export const ConfigDocumentNameSchema = Schema.Literal(
  "energy_profiles",
  "cwu_schedule",
  "system_config",
  "user_corrections",
);

export type ConfigDocumentName = Schema.Schema.Type<typeof ConfigDocumentNameSchema>;

export const CONFIG_DOCUMENT_NAMES = ConfigDocumentNameSchema.literals;

export type ConfigDocumentContent = Readonly<Record<string, unknown>>;

export type ConfigDocument = {
  readonly name: ConfigDocumentName;
  readonly content: ConfigDocumentContent;
  readonly loadedAt: Date;
};

export type ConfigStatus = {
  readonly lastLoadTime: string | null; // ISO 8601, null until the first successful load
  readonly filesLoaded: Readonly<Record<ConfigDocumentName, boolean>>;
};

export class ConfigStore extends Context.Tag("ConfigStore")<
  ConfigStore,
  {
    /**
     * Reloads every document. Resolves to `true` only when all of them loaded
     * in this call; failed documents keep their previous value.
     */
    readonly reloadAll: () => Effect.Effect<boolean>;
    readonly getEnergyProfiles: (dayType?: DayType) => Effect.Effect<ConfigDocumentContent | null>;
    readonly getCwuSchedule: () => Effect.Effect<ConfigDocumentContent | null>;
    readonly getSystemConfig: () => Effect.Effect<ConfigDocumentContent | null>;
    readonly getUserCorrections: () => Effect.Effect<ConfigDocumentContent | null>;
    readonly getStatus: () => Effect.Effect<ConfigStatus>;
  }
>() {}

export type IConfigStore = Context.Tag.Service<typeof ConfigStore>;

export const fileNameOf = (name: ConfigDocumentName): string => `${name}.json`;
