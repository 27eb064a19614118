/**
 * Query compiler.
 *
 * Pure functions turning a request plus normalizer output into a compiled
 * query. Nothing here reads the clock or performs I/O; callers pass "now".
 */

import type { NormalizedQuery } from "./normalizer";
import type {
  BoolPrefixClause,
  BoolQuery,
  CompiledQuery,
  FilterClause,
  SimpleQueryStringClause,
  SortKey,
  TermFilter,
} from "./query";
import type {
  ActorSearchQuery,
  PaginationRequest,
  PostSearchQuery,
} from "./types";

/** Single combined full-text field of both indexes. */
export const FULL_TEXT_FIELD = "everything";

export const TYPEAHEAD_FIELDS = [
  "typeahead",
  "typeahead._2gram",
  "typeahead._3gram",
] as const;

/** Down-weights text relevance against the authority sort. */
export const PROFILE_BOOST = 0.5;

const BY_RECENCY: SortKey = { field: "created_at", order: "desc" };
const BY_AUTHORITY: SortKey = { field: "pagerank", order: "desc" };

const PROFILE_BOOSTS: readonly TermFilter[] = [
  { kind: "term", field: "has_avatar", value: true },
  { kind: "term", field: "has_banner", value: true },
];

function fullTextMatch(query: string): SimpleQueryStringClause {
  return {
    kind: "simple_query_string",
    query,
    fields: [FULL_TEXT_FIELD],
    flags: "AND|NOT|OR|PHRASE|PRECEDENCE|WHITESPACE",
    defaultOperator: "and",
    lenient: true,
    analyzeWildcard: false,
  };
}

function typeaheadMatch(query: string): BoolPrefixClause {
  return {
    kind: "bool_prefix",
    query,
    fields: TYPEAHEAD_FIELDS,
    operator: "and",
  };
}

function termsFilter(
  field: string,
  values: readonly string[] | undefined
): FilterClause[] {
  if (values === undefined || values.length === 0) {
    return [];
  }
  return [{ kind: "terms", field, values: [...values] }];
}

function profileBool(
  normalized: NormalizedQuery,
  filter: readonly FilterClause[]
): BoolQuery {
  return {
    kind: "bool",
    must: fullTextMatch(normalized.query),
    should: PROFILE_BOOSTS,
    minimumShouldMatch: 0,
    filter,
    boost: PROFILE_BOOST,
  };
}

/**
 * Posts ordered by creation time.
 *
 * A `created_at` upper bound is always present so that posts dated in the
 * future never surface; an explicit `to` replaces it.
 */
export function compilePostSearch(
  q: PostSearchQuery,
  normalized: NormalizedQuery,
  now: Date
): CompiledQuery {
  const filter: FilterClause[] = [
    ...normalized.filters,
    {
      kind: "range",
      field: "created_at",
      gte: q.from?.toISOString(),
      lte: (q.to ?? now).toISOString(),
    },
    ...termsFilter("did", q.actors),
    ...termsFilter("tag", q.tags),
    ...termsFilter("lang", q.langs),
  ];

  return {
    query: {
      kind: "bool",
      must: fullTextMatch(normalized.query),
      should: [],
      filter,
    },
    sort: BY_RECENCY,
    size: q.size,
    from: q.offset,
  };
}

/**
 * Profiles ranked by pagerank, with avatar and banner as optional boosts.
 * Text relevance decides only which profiles match.
 */
export function compileProfileSearch(
  q: PaginationRequest & Pick<ActorSearchQuery, "following">,
  normalized: NormalizedQuery
): CompiledQuery {
  return {
    query: profileBool(normalized, [
      ...normalized.filters,
      ...termsFilter("did", q.following),
    ]),
    sort: BY_AUTHORITY,
    size: q.size,
    from: q.offset,
  };
}

/**
 * Prefix typeahead without paging: always the first `size` hits.
 */
export function compileTypeahead(text: string, size: number): CompiledQuery {
  return {
    query: typeaheadMatch(text),
    sort: BY_AUTHORITY,
    size,
  };
}

export function compileTypeaheadStructured(
  q: ActorSearchQuery
): CompiledQuery {
  return {
    query: {
      kind: "bool",
      must: typeaheadMatch(q.query),
      should: [],
      filter: termsFilter("did", q.following),
    },
    sort: BY_AUTHORITY,
    size: q.size,
    from: q.offset,
  };
}

/**
 * Raw `query_string` passthrough. Leaves paging and sort to the backend.
 */
export function compileUnrestricted(text: string): CompiledQuery {
  return {
    query: {
      kind: "query_string",
      query: text,
      defaultField: FULL_TEXT_FIELD,
      defaultOperator: "and",
      analyzeWildcard: true,
      allowLeadingWildcard: false,
      lenient: true,
    },
  };
}
