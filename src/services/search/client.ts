/**
 * Search backend interface.
 *
 * The executor talks to the search engine only through this interface, so
 * the connection stays owned by the caller and tests can substitute an
 * in-process fake. This API is read-only: indexing happens elsewhere.
 */

/**
 * A serialized search request against one index.
 */
export interface BackendRequest {
  index: string;
  /** JSON request body. */
  body: string;
}

/**
 * What the backend answered, before any interpretation.
 *
 * `body` is either already-parsed JSON or the raw response text.
 */
export interface BackendResponse {
  statusCode: number;
  body: unknown;
}

/**
 * Abstract search backend for dependency injection.
 *
 * @example
 * ```typescript
 * // Production
 * const backend = new OpenSearchBackend(new Client({ node: "http://localhost:9200" }));
 *
 * // Testing
 * const backend: SearchBackend = {
 *   search: async () => ({ statusCode: 200, body: emptyResponse }),
 *   healthCheck: async () => true,
 * };
 * ```
 */
export interface SearchBackend {
  /**
   * Submit a search request.
   *
   * Resolves with any HTTP status the backend answered with and rejects
   * only when no answer was received. Aborting `signal` cancels the
   * in-flight request.
   */
  search(request: BackendRequest, signal: AbortSignal): Promise<BackendResponse>;

  /**
   * Check if the search engine is healthy.
   */
  healthCheck(): Promise<boolean>;
}
