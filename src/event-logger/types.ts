import type { Effect } from "effect";

export type IEventLogger = {
  onBoilerFromFurnaceEnabled: () => Effect.Effect<void>;
  onBoilerFromFurnaceDisabled: (heatersLocked: boolean) => Effect.Effect<void>;
  onRefreshed: (allDocumentsLoaded: boolean) => Effect.Effect<void>;
};
