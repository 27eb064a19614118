/**
 * Search service types.
 *
 * These types define the request and response contract of the query
 * compiler. Requests are plain value objects; nothing here is persisted
 * between calls.
 */

/**
 * Pagination window shared by every paged request shape.
 */
export interface PaginationRequest {
  /** Number of hits to skip. */
  offset: number;
  /** Maximum number of hits to return. */
  size: number;
}

/**
 * Structured post search, ordered by creation time.
 */
export interface PostSearchQuery extends PaginationRequest {
  /** Free text, including any inline syntax the normalizer understands. */
  query: string;
  /** Inclusive lower bound on `created_at`. */
  from?: Date;
  /** Inclusive upper bound on `created_at`. Defaults to "now". */
  to?: Date;
  /** Author DIDs. */
  actors?: string[];
  tags?: string[];
  /** Language codes, e.g. "en", "ja". */
  langs?: string[];
}

/**
 * Structured profile search.
 */
export interface ActorSearchQuery extends PaginationRequest {
  query: string;
  /**
   * Restricts results to this set of DIDs (usually the accounts the
   * requesting user follows).
   */
  following?: string[];
  /** Selects the prefix-matching typeahead path. */
  typeahead: boolean;
}

/**
 * A single hit as returned by the backend.
 *
 * `score` is null for sorted queries, where the backend skips scoring.
 */
export interface SearchHit {
  index: string;
  id: string;
  score: number | null;
  /** Raw document payload. Use `decodeHits` to read it with a schema. */
  source: unknown;
}

/**
 * Complete search response with hits and metadata.
 */
export interface SearchResponse {
  /** Time taken by the backend in milliseconds. */
  took: number;
  timedOut: boolean;
  maxScore: number | null;
  /** Total number of matching documents, when the backend reports it. */
  total?: number;
  /** Hits in the order the backend ranked them. */
  hits: SearchHit[];
}

/**
 * Pagination parameters out of bounds. Returned before any backend call.
 */
export class InvalidParamsError extends Error {
  readonly _tag = "InvalidParamsError";
}

/**
 * The compiled query could not be turned into its wire form.
 */
export class SerializationError extends Error {
  readonly _tag = "SerializationError";
}

/**
 * The backend could not be reached, or the request was cancelled or timed
 * out before it answered.
 */
export class TransportError extends Error {
  readonly _tag = "TransportError";
}

/**
 * The backend answered with a non-2xx status.
 */
export class BackendError extends Error {
  readonly _tag = "BackendError";

  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`Search query error, code=${statusCode}`);
  }
}

/**
 * The backend answered 2xx with a body that is not a search response.
 */
export class DecodeError extends Error {
  readonly _tag = "DecodeError";
}

/**
 * Failures of the execution step.
 */
export type ExecutionError =
  | SerializationError
  | TransportError
  | BackendError
  | DecodeError;

/**
 * Failures of any paged search operation.
 */
export type SearchFailure = InvalidParamsError | ExecutionError;
