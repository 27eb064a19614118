/**
 * Search response decoding.
 */

import { Effect, Schema } from "effect";
import { DecodeError, type SearchHit, type SearchResponse } from "./types";

const EsSearchHit = Schema.Struct({
  _index: Schema.String,
  _id: Schema.String,
  _score: Schema.optionalWith(Schema.NullOr(Schema.Number), { default: () => null }),
  _source: Schema.Unknown,
});

const EsSearchHits = Schema.Struct({
  total: Schema.optional(
    Schema.Union(
      Schema.Number,
      Schema.Struct({ value: Schema.Number, relation: Schema.String })
    )
  ),
  max_score: Schema.optionalWith(Schema.NullOr(Schema.Number), { default: () => null }),
  hits: Schema.Array(EsSearchHit),
});

const EsSearchResponse = Schema.Struct({
  took: Schema.Number,
  timed_out: Schema.Boolean,
  hits: EsSearchHits,
});

function parseBody(body: unknown): Effect.Effect<unknown, DecodeError> {
  if (typeof body !== "string") {
    return Effect.succeed(body);
  }
  return Effect.try({
    try: (): unknown => JSON.parse(body),
    catch: (error) =>
      new DecodeError(`Could not parse search response JSON: ${error}`, { cause: error }),
  });
}

/**
 * Decode a 2xx backend body into a SearchResponse.
 */
export function decodeSearchResponse(
  body: unknown
): Effect.Effect<SearchResponse, DecodeError> {
  return Effect.gen(function* () {
    const json = yield* parseBody(body);
    const decoded = yield* Schema.decodeUnknown(EsSearchResponse)(json).pipe(
      Effect.mapError(
        (error) =>
          new DecodeError(`Unexpected search response shape: ${error.message}`, {
            cause: error,
          })
      )
    );

    const { total } = decoded.hits;
    const hits: SearchHit[] = decoded.hits.hits.map((hit) => ({
      index: hit._index,
      id: hit._id,
      score: hit._score,
      source: hit._source,
    }));

    return {
      took: decoded.took,
      timedOut: decoded.timed_out,
      maxScore: decoded.hits.max_score,
      total: typeof total === "object" ? total.value : total,
      hits,
    };
  });
}

/**
 * Decode every hit's payload with the given schema, keeping hit order.
 *
 * @example
 * ```typescript
 * const posts = yield* decodeHits(response, PostDocument);
 * ```
 */
export function decodeHits<A, I>(
  response: SearchResponse,
  schema: Schema.Schema<A, I>
): Effect.Effect<A[], DecodeError> {
  return Effect.forEach(response.hits, (hit) =>
    Schema.decodeUnknown(schema)(hit.source).pipe(
      Effect.mapError(
        (error) =>
          new DecodeError(`Could not decode hit ${hit.id}: ${error.message}`, {
            cause: error,
          })
      )
    )
  );
}

/**
 * Post document as stored in the post index.
 */
export const PostDocument = Schema.Struct({
  doc_index_ts: Schema.optional(Schema.String),
  did: Schema.String,
  record_rkey: Schema.String,
  record_cid: Schema.String,
  created_at: Schema.optional(Schema.String),
  text: Schema.optional(Schema.String),
  lang_code: Schema.optional(Schema.Array(Schema.String)),
  tag: Schema.optional(Schema.Array(Schema.String)),
});
export type PostDocument = typeof PostDocument.Type;

/**
 * Profile document as stored in the profile index.
 */
export const ProfileDocument = Schema.Struct({
  doc_index_ts: Schema.optional(Schema.String),
  did: Schema.String,
  handle: Schema.String,
  record_cid: Schema.optional(Schema.String),
  display_name: Schema.optional(Schema.String),
  description: Schema.optional(Schema.String),
  has_avatar: Schema.optional(Schema.Boolean),
  has_banner: Schema.optional(Schema.Boolean),
  pagerank: Schema.optional(Schema.Number),
});
export type ProfileDocument = typeof ProfileDocument.Type;
