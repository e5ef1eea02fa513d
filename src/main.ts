import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Duration, Effect, Logger, LogLevel } from "effect"
import { AppConfig } from "./config.js";
import { serviceLayers } from "./layers.js";
import { StatusResolver } from "./status-resolver/types.js";

const isProd = process.env.NODE_ENV == 'production';

const logStatus = Effect.gen(function*() {
  const statusResolver = yield* StatusResolver;
  const status = yield* statusResolver.getStatus();

  yield* Effect.logInfo(`${status.dateLabel} ${status.time}: ${status.dayType}, window ${status.window}, tariff ${status.tariff}`, status);
});

const program = Effect.gen(function*() {
  const statusResolver = yield* StatusResolver;

  yield* logStatus;

  if (process.argv.includes('--once')) {
    return;
  }

  const refreshIntervalSeconds = yield* AppConfig.status.refreshIntervalSeconds;

  yield* Effect.logInfo(`Refreshing system status every ${refreshIntervalSeconds}s`);

  yield* statusResolver.refresh().pipe(
    Effect.zipRight(logStatus),
    Effect.withSpan('refreshCycle'),
    Effect.delay(Duration.seconds(refreshIntervalSeconds)),
    Effect.forever,
  );
}).pipe(
  Effect.provide(serviceLayers),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
