/**
 * Handle to DID resolution.
 */

import { Effect, Schema } from "effect";

export class IdentityResolutionError extends Error {
  readonly _tag = "IdentityResolutionError";
}

/**
 * Resolves a handle such as `alice.example.com` to a stable DID.
 *
 * Implementations are best-effort: callers treat any failure as "not
 * resolvable" and carry on.
 */
export interface IdentityResolver {
  resolveHandle(handle: string): Effect.Effect<string, IdentityResolutionError>;
}

const ResolveHandleOutput = Schema.Struct({
  did: Schema.String.pipe(Schema.startsWith("did:")),
});

/**
 * Resolver backed by the `com.atproto.identity.resolveHandle` XRPC method
 * of an identity service.
 *
 * @param serviceUrl - Base URL of the service, e.g. "https://public.api.bsky.app"
 * @param fetchFn - Fetch implementation, swappable in tests
 */
export function makeXrpcIdentityResolver(
  serviceUrl: string,
  fetchFn: typeof fetch = fetch
): IdentityResolver {
  return {
    resolveHandle: (handle) =>
      Effect.gen(function* () {
        const url = new URL("/xrpc/com.atproto.identity.resolveHandle", serviceUrl);
        url.searchParams.set("handle", handle);

        const response = yield* Effect.tryPromise({
          try: (signal) => fetchFn(url, { signal }),
          catch: (error) =>
            new IdentityResolutionError(`Handle lookup for ${handle} failed: ${error}`, {
              cause: error,
            }),
        }).pipe(Effect.withSpan("identity.resolveHandle"));

        if (!response.ok) {
          return yield* Effect.fail(
            new IdentityResolutionError(
              `Handle lookup for ${handle} failed with status ${response.status}`
            )
          );
        }

        const body = yield* Effect.tryPromise({
          try: (): Promise<unknown> => response.json(),
          catch: (error) =>
            new IdentityResolutionError(`Could not parse handle lookup response: ${error}`, {
              cause: error,
            }),
        });

        const { did } = yield* Schema.decodeUnknown(ResolveHandleOutput)(body).pipe(
          Effect.mapError(
            (error) =>
              new IdentityResolutionError(`Unexpected handle lookup response: ${error.message}`, {
                cause: error,
              })
          )
        );
        return did;
      }),
  };
}
