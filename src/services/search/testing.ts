/**
 * In-process stand-ins for the backend and normalizer, used by the tests.
 */

import { Effect } from "effect";
import type { BackendRequest, BackendResponse, SearchBackend } from "./client";
import type { QueryNormalizer } from "./normalizer";

export interface RecordingBackend {
  backend: SearchBackend;
  /** Every request received, in order. */
  requests: BackendRequest[];
  /** Parsed body of the request at `index`. */
  sentDocument(index?: number): unknown;
}

export function recordingBackend(
  respond: (request: BackendRequest, signal: AbortSignal) => Promise<BackendResponse>,
  healthy = true
): RecordingBackend {
  const requests: BackendRequest[] = [];
  return {
    requests,
    backend: {
      search: (request, signal) => {
        requests.push(request);
        return respond(request, signal);
      },
      healthCheck: async () => healthy,
    },
    sentDocument: (index = 0) => {
      const request = requests[index];
      return request === undefined ? undefined : JSON.parse(request.body);
    },
  };
}

export function searchBody(
  hits: Array<{ id: string; source: unknown; score?: number | null }>,
  index = "posts"
) {
  return {
    took: 3,
    timed_out: false,
    hits: {
      total: { value: hits.length, relation: "eq" },
      max_score: null,
      hits: hits.map((hit) => ({
        _index: index,
        _id: hit.id,
        _score: hit.score ?? null,
        _source: hit.source,
      })),
    },
  };
}

/** Backend that answers every query with the given hits. */
export function fixedBackend(
  hits: Array<{ id: string; source: unknown; score?: number | null }>,
  index = "posts"
): RecordingBackend {
  return recordingBackend(async () => ({ statusCode: 200, body: searchBody(hits, index) }));
}

/** Normalizer that leaves the text alone and extracts nothing. */
export const literalNormalizer: QueryNormalizer = {
  normalize: (raw) => Effect.succeed({ query: raw, filters: [] }),
};
