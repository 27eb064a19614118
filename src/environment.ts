import { Config, Context, Duration, Effect, Layer, LogLevel, Option } from "effect";

export interface EnvironmentShape {
  readonly opensearchUrl: string;
  readonly postIndex: string;
  readonly profileIndex: string;
  readonly identityServiceUrl: string;
  readonly searchTimeout: Option.Option<Duration.Duration>;
  readonly port: number;
  readonly logLevel: LogLevel.LogLevel;
}

export class Environment extends Context.Tag("Environment")<Environment, EnvironmentShape>() {}

export const loadEnvironment = Effect.gen(function* () {
  const opensearchUrl = yield* Config.string("OPENSEARCH_URL").pipe(
    Config.withDefault("http://localhost:9200")
  );
  const postIndex = yield* Config.string("POST_INDEX").pipe(Config.withDefault("posts"));
  const profileIndex = yield* Config.string("PROFILE_INDEX").pipe(Config.withDefault("profiles"));
  const identityServiceUrl = yield* Config.string("IDENTITY_SERVICE_URL").pipe(
    Config.withDefault("https://public.api.bsky.app")
  );
  const timeoutMs = yield* Config.option(Config.integer("SEARCH_TIMEOUT_MS"));
  const port = yield* Config.integer("PORT").pipe(Config.withDefault(3000));
  const logLevel = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info));

  return {
    opensearchUrl,
    postIndex,
    profileIndex,
    identityServiceUrl,
    searchTimeout: Option.map(timeoutMs, Duration.millis),
    port,
    logLevel,
  } satisfies EnvironmentShape;
});

export const EnvironmentLive = Layer.effect(Environment, loadEnvironment);
