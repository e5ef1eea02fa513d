import { Clock, Effect, Layer, Predicate, Ref, Schema } from "effect";
import { FileSystem, Path } from "@effect/platform";
import type { DayType } from "../calendar/day-type.js";
import {
  CONFIG_DOCUMENT_NAMES,
  ConfigStore,
  fileNameOf,
  type ConfigDocument,
  type ConfigDocumentContent,
  type ConfigDocumentName,
  type ConfigStatus,
} from "./types.js";
import {
  ConfigParseFailedError,
  ConfigSourceUnreadableError,
  EmptyConfigDocumentError,
  type ConfigLoadError,
} from "./errors.js";

export type JsonFileConfigStoreConfig = {
  readonly directory: string;
};

type ConfigCache = {
  readonly documents: Partial<Record<ConfigDocumentName, ConfigDocument>>;
  readonly lastLoadTime: Date | null;
};

const EMPTY_CACHE: ConfigCache = { documents: {}, lastLoadTime: null };

const decodeJson = Schema.decodeUnknown(Schema.parseJson());

export const JsonFileConfigStoreLayer = (
  config: JsonFileConfigStoreConfig
): Layer.Layer<ConfigStore, never, FileSystem.FileSystem | Path.Path> =>
  Layer.effect(
    ConfigStore,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;
      const path = yield* Path.Path;

      const cache = yield* Ref.make(EMPTY_CACHE);
      // Reload is read-all-then-swap; one at a time keeps the four slots consistent.
      const reloadLock = yield* Effect.makeSemaphore(1);

      const loadDocument = (
        name: ConfigDocumentName
      ): Effect.Effect<ConfigDocumentContent, ConfigLoadError> =>
        Effect.gen(function* () {
          const filePath = path.join(config.directory, fileNameOf(name));

          const exists = yield* fileSystem.exists(filePath).pipe(
            Effect.mapError(
              (cause) =>
                new ConfigSourceUnreadableError({
                  document: name,
                  path: filePath,
                  message: `Cannot access configuration file ${filePath}: ${cause.message}`,
                  cause,
                })
            )
          );
          if (!exists) {
            return yield* Effect.fail(
              new ConfigSourceUnreadableError({
                document: name,
                path: filePath,
                message: `Configuration file does not exist: ${filePath}`,
              })
            );
          }

          const raw = yield* fileSystem.readFileString(filePath, "utf-8").pipe(
            Effect.mapError(
              (cause) =>
                new ConfigSourceUnreadableError({
                  document: name,
                  path: filePath,
                  message: `Cannot read configuration file ${filePath}: ${cause.message}`,
                  cause,
                })
            )
          );

          const json = yield* decodeJson(raw).pipe(
            Effect.mapError(
              (cause) =>
                new ConfigParseFailedError({
                  document: name,
                  path: filePath,
                  message: `Invalid JSON in ${fileNameOf(name)}: ${cause.message}`,
                  cause,
                })
            )
          );

          if (!Predicate.isRecord(json)) {
            return yield* Effect.fail(
              new ConfigParseFailedError({
                document: name,
                path: filePath,
                message: `Top-level value in ${fileNameOf(name)} is not a JSON object`,
              })
            );
          }
          if (Object.keys(json).length === 0) {
            return yield* Effect.fail(new EmptyConfigDocumentError({ document: name, path: filePath }));
          }

          yield* Effect.logInfo(`Loaded configuration from ${fileNameOf(name)}`);
          return json;
        });

      const reloadAll = (): Effect.Effect<boolean> =>
        reloadLock.withPermits(1)(
          Effect.gen(function* () {
            yield* Effect.logInfo("Reloading all configuration documents");

            const results = yield* Effect.forEach(CONFIG_DOCUMENT_NAMES, (name) =>
              loadDocument(name).pipe(
                Effect.map((content) => ({ name, content })),
                Effect.catchAll((error) =>
                  Effect.logError(error.message, { document: name, reason: error._tag }).pipe(
                    Effect.as(null)
                  )
                )
              )
            );

            const loadedAt = new Date(yield* Clock.currentTimeMillis);
            const loaded: Partial<Record<ConfigDocumentName, ConfigDocument>> = {};
            const failed: ConfigDocumentName[] = [];

            results.forEach((result, index) => {
              if (result === null) {
                failed.push(CONFIG_DOCUMENT_NAMES[index]);
                return;
              }
              loaded[result.name] = { ...result, loadedAt };
            });

            const loadedNames = Object.keys(loaded);

            yield* Ref.update(cache, (current) => ({
              documents: { ...current.documents, ...loaded },
              lastLoadTime: loadedNames.length > 0 ? loadedAt : current.lastLoadTime,
            }));

            if (loadedNames.length > 0) {
              yield* Effect.logInfo(`Loaded configuration files: ${loadedNames.map((name) => `${name}.json`).join(", ")}`);
            }
            if (failed.length > 0) {
              yield* Effect.logWarning("Some configuration documents could not be loaded", { failed });
            }

            return failed.length === 0;
          })
        );

      const getDocument = (name: ConfigDocumentName): Effect.Effect<ConfigDocumentContent | null> =>
        Effect.gen(function* () {
          if ((yield* Ref.get(cache)).documents[name] === undefined) {
            yield* reloadAll();
          }

          const content = (yield* Ref.get(cache)).documents[name]?.content;
          return content === undefined ? null : structuredClone(content);
        });

      const getEnergyProfiles = (dayType?: DayType): Effect.Effect<ConfigDocumentContent | null> =>
        getDocument("energy_profiles").pipe(
          Effect.map((document) => {
            if (document === null || dayType === undefined) {
              return document;
            }

            const profiles = document["energy_profiles"];
            const profile = Predicate.isRecord(profiles) ? profiles[dayType] : undefined;
            return Predicate.isRecord(profile) ? profile : null;
          })
        );

      const getStatus = (): Effect.Effect<ConfigStatus> =>
        Ref.get(cache).pipe(
          Effect.map(({ documents, lastLoadTime }) => ({
            lastLoadTime: lastLoadTime?.toISOString() ?? null,
            filesLoaded: {
              energy_profiles: documents.energy_profiles !== undefined,
              cwu_schedule: documents.cwu_schedule !== undefined,
              system_config: documents.system_config !== undefined,
              user_corrections: documents.user_corrections !== undefined,
            },
          }))
        );

      return ConfigStore.of({
        reloadAll,
        getEnergyProfiles,
        getCwuSchedule: () => getDocument("cwu_schedule"),
        getSystemConfig: () => getDocument("system_config"),
        getUserCorrections: () => getDocument("user_corrections"),
        getStatus,
      });
    })
  );
