import type { IEventLogger } from "./types.js";
import { Effect } from "effect";

export class EventLogger implements IEventLogger {

  public onBoilerFromFurnaceEnabled() {
    return Effect.logInfo('Hot water from furnace boiler: ON (electric heaters locked)');
  }

  public onBoilerFromFurnaceDisabled(heatersLocked: boolean) {
    return Effect.logWarning('Hot water from furnace boiler: OFF (watch the electric heaters!)', {
      heatersLocked,
    });
  }

  public onRefreshed(allDocumentsLoaded: boolean) {
    return Effect.logDebug(`System data refreshed${allDocumentsLoaded ? '' : ' (some configuration documents unavailable)'}`);
  }
}
