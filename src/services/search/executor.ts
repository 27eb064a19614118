/**
 * Query executor.
 *
 * Serializes a compiled query, submits it once and classifies the outcome.
 * Retries are left to the caller: only TransportError is worth retrying.
 */

import { Duration, Effect } from "effect";
import type { SearchBackend } from "./client";
import { type CompiledQuery, toDocument } from "./query";
import { decodeSearchResponse } from "./response";
import {
  BackendError,
  type ExecutionError,
  SerializationError,
  type SearchResponse,
  TransportError,
} from "./types";

export interface ExecuteOptions {
  /**
   * Give up waiting for the backend after this long. The in-flight request
   * is aborted and the call fails with TransportError.
   */
  timeout?: Duration.DurationInput;
}

function rawBody(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body) ?? "";
}

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Execute a compiled query against `index`.
 */
export function executeSearch(
  backend: SearchBackend,
  index: string,
  compiled: CompiledQuery,
  options: ExecuteOptions = {}
): Effect.Effect<SearchResponse, ExecutionError> {
  const run = Effect.gen(function* () {
    const body = yield* Effect.try({
      try: () => JSON.stringify(toDocument(compiled)),
      catch: (error) =>
        new SerializationError(`Failed to serialize query: ${error}`, { cause: error }),
    });

    yield* Effect.annotateCurrentSpan({ index, query: body, querySize: body.length });
    yield* Effect.logInfo("[SEARCH] Sending query").pipe(
      Effect.annotateLogs({ index, query: body })
    );

    const response = yield* Effect.tryPromise({
      try: (signal) => backend.search({ index, body }, signal),
      catch: (error) =>
        new TransportError(`Search query error: ${error}`, { cause: error }),
    });

    if (!isSuccess(response.statusCode)) {
      const raw = rawBody(response.body);
      yield* Effect.logWarning("[SEARCH] Search query error").pipe(
        Effect.annotateLogs({ index, statusCode: response.statusCode, response: raw })
      );
      return yield* Effect.fail(new BackendError(response.statusCode, raw));
    }

    return yield* decodeSearchResponse(response.body);
  });

  const { timeout } = options;
  const bounded =
    timeout === undefined
      ? run
      : run.pipe(
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () =>
              new TransportError(
                `Search query timed out after ${Duration.format(Duration.decode(timeout))}`
              ),
          })
        );

  return bounded.pipe(Effect.withSpan("search.execute", { attributes: { index } }));
}
