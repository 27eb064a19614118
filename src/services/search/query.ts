/**
 * Compiled query document model.
 *
 * Every clause the compiler can emit is one of the variants below, so a
 * compiled query is checked when it is built and `toDocument` can turn any
 * of them into OpenSearch JSON without a fallback branch.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

export type Operator = "and" | "or";

/**
 * Lenient `simple_query_string` match. Understands only the operators
 * listed in `flags`.
 */
export interface SimpleQueryStringClause {
  kind: "simple_query_string";
  query: string;
  fields: readonly string[];
  flags: string;
  defaultOperator: Operator;
  lenient: boolean;
  analyzeWildcard: boolean;
}

/**
 * `multi_match` of type `bool_prefix`: the last token matches as a prefix,
 * earlier tokens as whole terms.
 */
export interface BoolPrefixClause {
  kind: "bool_prefix";
  query: string;
  fields: readonly string[];
  operator: Operator;
}

/**
 * Full `query_string` with the backend's own grammar.
 */
export interface QueryStringClause {
  kind: "query_string";
  query: string;
  defaultField: string;
  defaultOperator: Operator;
  analyzeWildcard: boolean;
  allowLeadingWildcard: boolean;
  lenient: boolean;
}

export type ScoringClause =
  | SimpleQueryStringClause
  | BoolPrefixClause
  | QueryStringClause;

export interface TermFilter {
  kind: "term";
  field: string;
  value: string | number | boolean;
}

export interface TermsFilter {
  kind: "terms";
  field: string;
  values: readonly string[];
}

/**
 * Inclusive range. Bounds are ISO 8601 timestamps.
 */
export interface RangeFilter {
  kind: "range";
  field: string;
  gte?: string;
  lte?: string;
}

export type FilterClause = TermFilter | TermsFilter | RangeFilter;

/**
 * Boolean combinator. `must` scores, `should` adds optional score and
 * `filter` restricts without scoring.
 */
export interface BoolQuery {
  kind: "bool";
  must: ScoringClause;
  should: readonly TermFilter[];
  filter: readonly FilterClause[];
  minimumShouldMatch?: number;
  boost?: number;
}

export type QueryClause = ScoringClause | BoolQuery;

export interface SortKey {
  field: string;
  order: "asc" | "desc";
}

export interface CompiledQuery {
  query: QueryClause;
  sort?: SortKey;
  size?: number;
  from?: number;
}

function scoringToDocument(clause: ScoringClause): JsonObject {
  switch (clause.kind) {
    case "simple_query_string":
      return {
        simple_query_string: {
          query: clause.query,
          fields: clause.fields,
          flags: clause.flags,
          default_operator: clause.defaultOperator,
          lenient: clause.lenient,
          analyze_wildcard: clause.analyzeWildcard,
        },
      };
    case "bool_prefix":
      return {
        multi_match: {
          query: clause.query,
          type: "bool_prefix",
          operator: clause.operator,
          fields: clause.fields,
        },
      };
    case "query_string":
      return {
        query_string: {
          query: clause.query,
          default_operator: clause.defaultOperator,
          analyze_wildcard: clause.analyzeWildcard,
          allow_leading_wildcard: clause.allowLeadingWildcard,
          lenient: clause.lenient,
          default_field: clause.defaultField,
        },
      };
  }
}

function filterToDocument(clause: FilterClause): JsonObject {
  switch (clause.kind) {
    case "term":
      return { term: { [clause.field]: clause.value } };
    case "terms":
      return { terms: { [clause.field]: clause.values } };
    case "range": {
      const bounds: Record<string, string> = {};
      if (clause.gte !== undefined) {
        bounds.gte = clause.gte;
      }
      if (clause.lte !== undefined) {
        bounds.lte = clause.lte;
      }
      return { range: { [clause.field]: bounds } };
    }
  }
}

function queryToDocument(clause: QueryClause): JsonObject {
  if (clause.kind !== "bool") {
    return scoringToDocument(clause);
  }

  const bool: Record<string, JsonValue> = {
    must: scoringToDocument(clause.must),
  };
  if (clause.should.length > 0) {
    bool.should = clause.should.map(filterToDocument);
  }
  if (clause.minimumShouldMatch !== undefined) {
    bool.minimum_should_match = clause.minimumShouldMatch;
  }
  bool.filter = clause.filter.map(filterToDocument);
  if (clause.boost !== undefined) {
    bool.boost = clause.boost;
  }
  return { bool };
}

/**
 * Build the OpenSearch request body for a compiled query.
 */
export function toDocument(compiled: CompiledQuery): JsonObject {
  const document: Record<string, JsonValue> = {
    query: queryToDocument(compiled.query),
  };
  if (compiled.sort !== undefined) {
    document.sort = {
      [compiled.sort.field]: { order: compiled.sort.order },
    };
  }
  if (compiled.size !== undefined) {
    document.size = compiled.size;
  }
  if (compiled.from !== undefined) {
    document.from = compiled.from;
  }
  return document;
}
