/**
 * Search operations.
 *
 * Each operation validates pagination, normalizes the free text, compiles
 * the query for its shape and executes it. Compilation is pure; the only
 * suspension point is the backend call.
 */

import { Clock, type Duration, Effect } from "effect";
import type { SearchBackend } from "./client";
import {
  compilePostSearch,
  compileProfileSearch,
  compileTypeahead,
  compileTypeaheadStructured,
} from "./compiler";
import { executeSearch } from "./executor";
import type { QueryNormalizer } from "./normalizer";
import { checkParams } from "./pagination";
import {
  type ActorSearchQuery,
  InvalidParamsError,
  type PostSearchQuery,
  type SearchFailure,
  type SearchResponse,
} from "./types";

/**
 * Everything needed to run a query against one index.
 */
export interface ExecutionContext {
  readonly backend: SearchBackend;
  readonly index: string;
  readonly timeout?: Duration.DurationInput;
}

export interface SearchContext extends ExecutionContext {
  readonly normalizer: QueryNormalizer;
}

function checkTimestamp(
  name: string,
  value: Date | undefined
): Effect.Effect<void, InvalidParamsError> {
  if (value !== undefined && Number.isNaN(value.getTime())) {
    return Effect.fail(new InvalidParamsError(`invalid ${name} timestamp`));
  }
  return Effect.void;
}

const currentDate = Effect.map(Clock.currentTimeMillis, (millis) => new Date(millis));

export function searchPostsStructured(
  ctx: SearchContext,
  q: PostSearchQuery
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(q.offset, q.size);
    yield* checkTimestamp("from", q.from);
    yield* checkTimestamp("to", q.to);

    const normalized = yield* ctx.normalizer.normalize(q.query);
    const now = yield* currentDate;
    const compiled = compilePostSearch(q, normalized, now);
    return yield* executeSearch(ctx.backend, ctx.index, compiled, ctx);
  }).pipe(
    Effect.withSpan("search.postsStructured", {
      attributes: {
        index: ctx.index,
        query: q.query,
        offset: q.offset,
        size: q.size,
        actors: q.actors?.length ?? 0,
        tags: q.tags?.length ?? 0,
        langs: q.langs?.length ?? 0,
      },
    })
  );
}

export function searchPosts(
  ctx: SearchContext,
  query: string,
  offset: number,
  size: number
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(offset, size);
    const normalized = yield* ctx.normalizer.normalize(query);
    const now = yield* currentDate;
    const compiled = compilePostSearch({ query, offset, size }, normalized, now);
    return yield* executeSearch(ctx.backend, ctx.index, compiled, ctx);
  }).pipe(
    Effect.withSpan("search.posts", {
      attributes: { index: ctx.index, query, offset, size },
    })
  );
}

export function searchProfiles(
  ctx: SearchContext,
  query: string,
  offset: number,
  size: number
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(offset, size);
    const normalized = yield* ctx.normalizer.normalize(query);
    const compiled = compileProfileSearch({ offset, size }, normalized);
    return yield* executeSearch(ctx.backend, ctx.index, compiled, ctx);
  }).pipe(
    Effect.withSpan("search.profiles", {
      attributes: { index: ctx.index, query, offset, size },
    })
  );
}

export function searchProfilesStructured(
  ctx: SearchContext,
  q: ActorSearchQuery
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(q.offset, q.size);
    const normalized = yield* ctx.normalizer.normalize(q.query);
    const compiled = compileProfileSearch(q, normalized);
    return yield* executeSearch(ctx.backend, ctx.index, compiled, ctx);
  }).pipe(
    Effect.withSpan("search.profilesStructured", {
      attributes: {
        index: ctx.index,
        query: q.query,
        offset: q.offset,
        size: q.size,
        following: q.following?.length ?? 0,
      },
    })
  );
}

/**
 * Typeahead matches the raw prefix as typed; inline syntax is not
 * interpreted.
 */
export function searchProfilesTypeahead(
  ctx: ExecutionContext,
  query: string,
  size: number
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(0, size);
    return yield* executeSearch(ctx.backend, ctx.index, compileTypeahead(query, size), ctx);
  }).pipe(
    Effect.withSpan("search.profilesTypeahead", {
      attributes: { index: ctx.index, query, size },
    })
  );
}

export function searchProfilesTypeaheadStructured(
  ctx: ExecutionContext,
  q: ActorSearchQuery
): Effect.Effect<SearchResponse, SearchFailure> {
  return Effect.gen(function* () {
    yield* checkParams(q.offset, q.size);
    return yield* executeSearch(
      ctx.backend,
      ctx.index,
      compileTypeaheadStructured(q),
      ctx
    );
  }).pipe(
    Effect.withSpan("search.profilesTypeaheadStructured", {
      attributes: {
        index: ctx.index,
        query: q.query,
        offset: q.offset,
        size: q.size,
        following: q.following?.length ?? 0,
      },
    })
  );
}

/**
 * Dispatch a structured actor query to the relevance or typeahead shape.
 */
export function searchActors(
  ctx: SearchContext,
  q: ActorSearchQuery
): Effect.Effect<SearchResponse, SearchFailure> {
  return q.typeahead
    ? searchProfilesTypeaheadStructured(ctx, q)
    : searchProfilesStructured(ctx, q);
}
