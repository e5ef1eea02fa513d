import { describe, it, expect } from "@effect/vitest";
import { Effect, Layer, Predicate, TestClock } from "effect";
import { FileSystem, Path } from "@effect/platform";
import { NodeFileSystem, NodePath } from "@effect/platform-node";
import { JsonFileConfigStoreLayer } from "../../../config-store/json-file.config-store.js";
import { ConfigStore, type ConfigDocumentName } from "../../../config-store/types.js";

const PlatformLayer = Layer.mergeAll(NodeFileSystem.layer, NodePath.layer);

const energyProfiles = {
  energy_profiles: {
    workday: { morning_kwh: 4.2 },
    saturday: { morning_kwh: 5.0 },
    sunday_or_holiday: "not-a-profile",
  },
};
const cwuSchedule = { cwu_schedule: { workday: [{ from: "05:30", to: "07:00" }] } };
const systemConfig = { tariff_g12w: { cheaper_night_hours: "22:00-06:00" } };
const userCorrections = { corrections: { pv_production_factor: 0.92 } };

const writeDocument = (directory: string, name: ConfigDocumentName, content: unknown) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    yield* fs.writeFileString(
      path.join(directory, `${name}.json`),
      typeof content === "string" ? content : JSON.stringify(content)
    );
  });

const removeDocument = (directory: string, name: ConfigDocumentName) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    yield* fs.remove(path.join(directory, `${name}.json`));
  });

const writeAllDocuments = (directory: string) =>
  Effect.all([
    writeDocument(directory, "energy_profiles", energyProfiles),
    writeDocument(directory, "cwu_schedule", cwuSchedule),
    writeDocument(directory, "system_config", systemConfig),
    writeDocument(directory, "user_corrections", userCorrections),
  ]);

const makeStore = (directory: string) =>
  ConfigStore.pipe(Effect.provide(JsonFileConfigStoreLayer({ directory })));

const T1 = Date.parse("2025-03-01T08:00:00.000Z");
const T2 = Date.parse("2025-03-01T09:30:00.000Z");

describe("JsonFileConfigStore", () => {
  describe("reloadAll", () => {
    it.scoped("should return true and record the load time when every document loads", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);
        yield* TestClock.setTime(T1);

        const store = yield* makeStore(directory);

        expect(yield* store.reloadAll()).toBe(true);
        expect(yield* store.getStatus()).toEqual({
          lastLoadTime: "2025-03-01T08:00:00.000Z",
          filesLoaded: {
            energy_profiles: true,
            cwu_schedule: true,
            system_config: true,
            user_corrections: true,
          },
        });
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should return false when one source is missing but keep the others", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeDocument(directory, "energy_profiles", energyProfiles);
        yield* writeDocument(directory, "system_config", systemConfig);
        yield* writeDocument(directory, "user_corrections", userCorrections);

        const store = yield* makeStore(directory);

        expect(yield* store.reloadAll()).toBe(false);
        expect(yield* store.getEnergyProfiles()).toEqual(energyProfiles);
        expect(yield* store.getSystemConfig()).toEqual(systemConfig);
        expect(yield* store.getUserCorrections()).toEqual(userCorrections);
        expect(yield* store.getCwuSchedule()).toBeNull();
        expect((yield* store.getStatus()).filesLoaded).toEqual({
          energy_profiles: true,
          cwu_schedule: false,
          system_config: true,
          user_corrections: true,
        });
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should keep the last good value when a document becomes unparsable", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        expect(yield* store.reloadAll()).toBe(true);

        yield* writeDocument(directory, "system_config", "{ \"tariff_g12w\": ");

        expect(yield* store.reloadAll()).toBe(false);
        expect(yield* store.getSystemConfig()).toEqual(systemConfig);
        expect((yield* store.getStatus()).filesLoaded.system_config).toBe(true);
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should keep the last good value when a source is removed", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        yield* store.reloadAll();
        yield* removeDocument(directory, "cwu_schedule");

        expect(yield* store.reloadAll()).toBe(false);
        expect(yield* store.getCwuSchedule()).toEqual(cwuSchedule);
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should reject documents that are not JSON objects", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);
        yield* writeDocument(directory, "cwu_schedule", [{ from: "05:30" }]);

        const store = yield* makeStore(directory);

        expect(yield* store.reloadAll()).toBe(false);
        expect((yield* store.getStatus()).filesLoaded.cwu_schedule).toBe(false);
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should treat an empty document as not loaded", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);
        yield* writeDocument(directory, "user_corrections", {});

        const store = yield* makeStore(directory);

        expect(yield* store.reloadAll()).toBe(false);
        expect((yield* store.getStatus()).filesLoaded.user_corrections).toBe(false);
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should update the load time after a partial reload", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        yield* TestClock.setTime(T1);
        yield* store.reloadAll();

        yield* removeDocument(directory, "energy_profiles");
        yield* TestClock.setTime(T2);

        expect(yield* store.reloadAll()).toBe(false);
        expect((yield* store.getStatus()).lastLoadTime).toBe("2025-03-01T09:30:00.000Z");
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should leave the load time unchanged when every document fails", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        yield* TestClock.setTime(T1);
        yield* store.reloadAll();

        yield* removeDocument(directory, "energy_profiles");
        yield* removeDocument(directory, "cwu_schedule");
        yield* removeDocument(directory, "system_config");
        yield* removeDocument(directory, "user_corrections");
        yield* TestClock.setTime(T2);

        expect(yield* store.reloadAll()).toBe(false);
        expect((yield* store.getStatus()).lastLoadTime).toBe("2025-03-01T08:00:00.000Z");
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should never set a load time when nothing ever loaded", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();

        const store = yield* makeStore(directory);

        expect(yield* store.reloadAll()).toBe(false);
        expect(yield* store.getStatus()).toEqual({
          lastLoadTime: null,
          filesLoaded: {
            energy_profiles: false,
            cwu_schedule: false,
            system_config: false,
            user_corrections: false,
          },
        });
      }).pipe(Effect.provide(PlatformLayer))
    );
  });

  describe("accessors", () => {
    it.scoped("should load lazily on first access", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);

        expect((yield* store.getStatus()).filesLoaded.system_config).toBe(false);
        expect(yield* store.getSystemConfig()).toEqual(systemConfig);
        // one lazy reload brings in every document
        expect((yield* store.getStatus()).filesLoaded).toEqual({
          energy_profiles: true,
          cwu_schedule: true,
          system_config: true,
          user_corrections: true,
        });
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should not reload from getStatus", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);

        yield* store.getStatus();
        expect(yield* store.getStatus()).toEqual({
          lastLoadTime: null,
          filesLoaded: {
            energy_profiles: false,
            cwu_schedule: false,
            system_config: false,
            user_corrections: false,
          },
        });
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should serve cached documents without touching the files again", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        yield* store.reloadAll();
        yield* writeDocument(directory, "user_corrections", { corrections: { pv_production_factor: 0.5 } });

        expect(yield* store.getUserCorrections()).toEqual(userCorrections);
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should not let callers change the cached documents", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);
        const schedule = yield* store.getCwuSchedule();
        const days = schedule?.["cwu_schedule"];
        if (Predicate.isRecord(days) && Array.isArray(days["workday"])) {
          days["workday"].push({ from: "12:00", to: "13:00" });
        }

        expect(yield* store.getCwuSchedule()).toEqual({
          cwu_schedule: { workday: [{ from: "05:30", to: "07:00" }] },
        });
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should filter energy profiles by day type", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeAllDocuments(directory);

        const store = yield* makeStore(directory);

        expect(yield* store.getEnergyProfiles("saturday")).toEqual({ morning_kwh: 5.0 });
        expect(yield* store.getEnergyProfiles("workday")).toEqual({ morning_kwh: 4.2 });
        // present but not an object
        expect(yield* store.getEnergyProfiles("sunday_or_holiday")).toBeNull();
      }).pipe(Effect.provide(PlatformLayer))
    );

    it.scoped("should return null for a day type when profiles never loaded", () =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const directory = yield* fs.makeTempDirectoryScoped();
        yield* writeDocument(directory, "energy_profiles", { something_else: {} });

        const store = yield* makeStore(directory);

        expect(yield* store.getEnergyProfiles("workday")).toBeNull();
        expect(yield* store.getEnergyProfiles()).toEqual({ something_else: {} });
      }).pipe(Effect.provide(PlatformLayer))
    );
  });
});
