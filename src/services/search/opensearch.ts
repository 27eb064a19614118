/**
 * OpenSearch backend implementation.
 *
 * Adapts an `@opensearch-project/opensearch` client to the SearchBackend
 * interface. The client is created and closed by the caller.
 */

import { Client, errors } from "@opensearch-project/opensearch";
import type { BackendRequest, BackendResponse, SearchBackend } from "./client";

/**
 * @example
 * ```typescript
 * const client = new Client({ node: "http://localhost:9200" });
 * const backend = new OpenSearchBackend(client);
 * await backend.healthCheck();
 * ```
 */
export class OpenSearchBackend implements SearchBackend {
  constructor(private readonly client: Client) {}

  /**
   * Each request is sent exactly once; the client's own retries are off.
   */
  search({ index, body }: BackendRequest, signal: AbortSignal): Promise<BackendResponse> {
    return new Promise((resolve, reject) => {
      const request = this.client.search({ index, body }, { maxRetries: 0 }, (error, result) => {
        signal.removeEventListener("abort", abort);
        if (!error) {
          resolve({ statusCode: result.statusCode ?? 200, body: result.body });
          return;
        }
        // Rejected queries and unparseable bodies are answers, not transport
        // failures; hand them back with the status the backend sent.
        if (error instanceof errors.ResponseError) {
          resolve({ statusCode: error.statusCode, body: error.body });
        } else if (error instanceof errors.DeserializationError) {
          resolve({ statusCode: result.statusCode ?? 200, body: error.data });
        } else {
          reject(error);
        }
      });
      const abort = () => request.abort();

      if (signal.aborted) {
        abort();
      } else {
        signal.addEventListener("abort", abort, { once: true });
      }
    });
  }

  /**
   * Check if the search engine is healthy.
   */
  async healthCheck(): Promise<boolean> {
    try {
      const health = await this.client.cluster.health({});
      return health.statusCode === 200;
    } catch {
      return false;
    }
  }
}
