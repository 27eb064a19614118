/**
 * Unrestricted query-string search for trusted, internal diagnostics.
 *
 * The query is handed to the backend's own query-string grammar, so any
 * caller who controls it can run arbitrarily expensive queries or probe
 * fields that the public shapes never expose. The operation therefore
 * requires a DiagnosticAccess service in its environment and is not part
 * of the public search module; whoever provides that service owns the
 * authorization decision.
 */

import { Context, Effect } from "effect";
import { compileUnrestricted } from "./compiler";
import { executeSearch } from "./executor";
import type { ExecutionContext } from "./search";
import type { ExecutionError, SearchResponse } from "./types";

export class DiagnosticAccess extends Context.Tag("DiagnosticAccess")<
  DiagnosticAccess,
  {
    /** Who was granted access, recorded with every query. */
    readonly principal: string;
  }
>() {}

export function searchUnrestricted(
  ctx: ExecutionContext,
  query: string
): Effect.Effect<SearchResponse, ExecutionError, DiagnosticAccess> {
  return Effect.gen(function* () {
    const access = yield* DiagnosticAccess;
    yield* Effect.logWarning("[SEARCH] Running unrestricted query").pipe(
      Effect.annotateLogs({ principal: access.principal, index: ctx.index })
    );
    return yield* executeSearch(ctx.backend, ctx.index, compileUnrestricted(query), ctx);
  }).pipe(
    Effect.withSpan("search.unrestricted", {
      attributes: { index: ctx.index, query },
    })
  );
}
