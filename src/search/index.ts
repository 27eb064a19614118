/**
 * Search route handler.
 *
 * Provides HTTP endpoints for post and profile search. The unrestricted
 * query-string shape is intentionally not routed.
 */

import { Effect, Logger, LogLevel } from "effect";
import { Hono } from "hono";
import {
  InvalidParamsError,
  PostDocument,
  ProfileDocument,
  type SearchContext,
  type SearchFailure,
  decodeHits,
  searchActors,
  searchPostsStructured,
} from "../services/search";

const DEFAULT_LIMIT = 25;

type Status = 200 | 400 | 500 | 502;

interface Outcome {
  status: Status;
  body: Record<string, unknown>;
}

export interface SearchServices {
  /** Context for the post index. */
  posts: SearchContext;
  /** Context for the profile index. */
  profiles: SearchContext;
  logLevel?: LogLevel.LogLevel;
}

function requiredParam(
  value: string | undefined,
  name: string
): Effect.Effect<string, InvalidParamsError> {
  const trimmed = value?.trim() ?? "";
  if (trimmed.length === 0) {
    return Effect.fail(new InvalidParamsError(`Query parameter '${name}' is required`));
  }
  return Effect.succeed(trimmed);
}

function integerParam(
  value: string | undefined,
  name: string,
  fallback: number
): Effect.Effect<number, InvalidParamsError> {
  if (value === undefined) {
    return Effect.succeed(fallback);
  }
  if (!/^\d+$/.test(value)) {
    return Effect.fail(new InvalidParamsError(`${name} must be a non-negative integer`));
  }
  return Effect.succeed(parseInt(value, 10));
}

function dateParam(
  value: string | undefined,
  name: string
): Effect.Effect<Date | undefined, InvalidParamsError> {
  if (value === undefined) {
    return Effect.succeed(undefined);
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    return Effect.fail(new InvalidParamsError(`${name} must be an ISO 8601 timestamp`));
  }
  return Effect.succeed(parsed);
}

function failureOutcome(error: SearchFailure): Effect.Effect<Outcome> {
  switch (error._tag) {
    case "InvalidParamsError":
      return Effect.succeed({
        status: 400,
        body: { error: "Invalid parameter", message: error.message },
      });
    case "SerializationError":
      return Effect.logError("[SEARCH] Search error").pipe(
        Effect.annotateLogs({ error: error.message }),
        Effect.as<Outcome>({
          status: 500,
          body: { error: "Search failed", message: "An unexpected error occurred" },
        })
      );
    case "TransportError":
    case "BackendError":
    case "DecodeError":
      return Effect.logError("[SEARCH] Search error").pipe(
        Effect.annotateLogs({ error: error.message }),
        Effect.as<Outcome>({
          status: 502,
          body: { error: "Search failed", message: error.message },
        })
      );
  }
}

/**
 * Create the search router with dependency-injected search contexts.
 *
 * @example
 * ```typescript
 * const backend = new OpenSearchBackend(new Client({ node: "http://localhost:9200" }));
 * const normalizer = makeQueryNormalizer(makeXrpcIdentityResolver("https://public.api.bsky.app"));
 * app.route(
 *   "/search",
 *   createSearchRouter({
 *     posts: { backend, normalizer, index: "posts" },
 *     profiles: { backend, normalizer, index: "profiles" },
 *   })
 * );
 * ```
 */
export function createSearchRouter(services: SearchServices) {
  const router = new Hono();
  const logLevel = services.logLevel ?? LogLevel.Info;

  const run = (program: Effect.Effect<Record<string, unknown>, SearchFailure>) =>
    Effect.runPromise(
      program.pipe(
        Effect.map((body): Outcome => ({ status: 200, body })),
        Effect.catchAll(failureOutcome),
        Logger.withMinimumLogLevel(logLevel)
      )
    );

  /**
   * GET /search/posts
   *
   * Query Parameters:
   * - q: Search text (required)
   * - limit: Maximum results (default: 25, max: 250)
   * - offset: Pagination offset (default: 0)
   * - since / until: ISO 8601 bounds on creation time
   * - author, tag, lang: Facets, each repeatable
   */
  router.get("/posts", async (c) => {
    const program = Effect.gen(function* () {
      const query = yield* requiredParam(c.req.query("q"), "q");
      const offset = yield* integerParam(c.req.query("offset"), "offset", 0);
      const size = yield* integerParam(c.req.query("limit"), "limit", DEFAULT_LIMIT);
      const from = yield* dateParam(c.req.query("since"), "since");
      const to = yield* dateParam(c.req.query("until"), "until");

      const response = yield* searchPostsStructured(services.posts, {
        query,
        offset,
        size,
        from,
        to,
        actors: c.req.queries("author"),
        tags: c.req.queries("tag"),
        langs: c.req.queries("lang"),
      });
      const posts = yield* decodeHits(response, PostDocument);

      return {
        hitsTotal: response.total,
        posts: posts.map((post) => ({
          uri: `at://${post.did}/app.bsky.feed.post/${post.record_rkey}`,
          cid: post.record_cid,
        })),
      };
    });

    const outcome = await run(program);
    return c.json(outcome.body, outcome.status);
  });

  /**
   * GET /search/actors
   *
   * Query Parameters:
   * - q: Search text, or the typed prefix when typeahead=true (required)
   * - typeahead: "true" for prefix matching
   * - following: DIDs to restrict results to, repeatable
   * - limit / offset: As for posts
   */
  router.get("/actors", async (c) => {
    const program = Effect.gen(function* () {
      const query = yield* requiredParam(c.req.query("q"), "q");
      const offset = yield* integerParam(c.req.query("offset"), "offset", 0);
      const size = yield* integerParam(c.req.query("limit"), "limit", DEFAULT_LIMIT);

      const response = yield* searchActors(services.profiles, {
        query,
        offset,
        size,
        following: c.req.queries("following"),
        typeahead: c.req.query("typeahead") === "true",
      });
      const actors = yield* decodeHits(response, ProfileDocument);

      return {
        hitsTotal: response.total,
        actors: actors.map((actor) => ({ did: actor.did, handle: actor.handle })),
      };
    });

    const outcome = await run(program);
    return c.json(outcome.body, outcome.status);
  });

  /**
   * GET /search/health
   *
   * Response:
   * - 200: { status: "healthy" }
   * - 503: { status: "unhealthy" }
   */
  router.get("/health", async (c) => {
    const healthy = await Effect.runPromise(
      Effect.tryPromise(() => services.posts.backend.healthCheck()).pipe(
        Effect.catchAll((error) =>
          Effect.logError("[SEARCH] Health check error").pipe(
            Effect.annotateLogs({ error: error.message }),
            Effect.as(false)
          )
        )
      )
    );
    if (healthy) {
      return c.json({ status: "healthy" });
    }
    return c.json({ status: "unhealthy" }, 503);
  });

  return router;
}
