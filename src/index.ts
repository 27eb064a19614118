import { serve } from "@hono/node-server";
import { Client } from "@opensearch-project/opensearch";
import { Effect, Logger, Option } from "effect";
import { Hono } from "hono";
import { Environment, EnvironmentLive } from "./environment";
import { createSearchRouter } from "./search";
import {
  OpenSearchBackend,
  makeQueryNormalizer,
  makeXrpcIdentityResolver,
} from "./services/search";

const main = Effect.gen(function* () {
  const config = yield* Environment;

  const backend = new OpenSearchBackend(new Client({ node: config.opensearchUrl }));
  const normalizer = makeQueryNormalizer(makeXrpcIdentityResolver(config.identityServiceUrl));
  const timeout = Option.getOrUndefined(config.searchTimeout);

  const app = new Hono();
  app.route(
    "/search",
    createSearchRouter({
      posts: { backend, normalizer, index: config.postIndex, timeout },
      profiles: { backend, normalizer, index: config.profileIndex, timeout },
      logLevel: config.logLevel,
    })
  );

  serve({ fetch: app.fetch, port: config.port });
  yield* Effect.logInfo(`[SERVER] Listening on port ${config.port}`).pipe(
    Effect.annotateLogs({ opensearch: config.opensearchUrl }),
    Logger.withMinimumLogLevel(config.logLevel)
  );
}).pipe(Effect.provide(EnvironmentLive));

Effect.runFork(main);
