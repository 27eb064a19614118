/**
 * Free-text normalizer.
 *
 * Splits raw user input into the text handed to the full-text match and
 * the facet filters written inline (`from:alice.example.com`, `lang:ja`).
 */

import { Effect, Option } from "effect";
import type { IdentityResolver } from "./identity";
import type { FilterClause } from "./query";

export interface NormalizedQuery {
  /** Text for the full-text match clause. */
  readonly query: string;
  /** Filters extracted from inline syntax, in input order. */
  readonly filters: readonly FilterClause[];
}

/**
 * Capability consumed by the compiler. Normalization never fails; input it
 * cannot interpret is passed through as literal text.
 */
export interface QueryNormalizer {
  normalize(raw: string): Effect.Effect<NormalizedQuery>;
}

export interface Token {
  text: string;
  quoted: boolean;
}

const HANDLE_PATTERN =
  /^([a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/;

const DID_PATTERN = /^did:[a-z]+:[a-zA-Z0-9._:%-]+$/;

const LANG_PATTERN = /^[a-zA-Z]{2,3}(-[a-zA-Z0-9]+)*$/;

/**
 * Whitespace split that keeps double-quoted runs together.
 *
 * @returns undefined when a quote is left open
 */
export function splitQuery(raw: string): Token[] | undefined {
  const tokens: Token[] = [];
  let current = "";
  let quoted = false;
  let inQuote = false;
  let started = false;

  for (const ch of raw) {
    if (ch === '"') {
      inQuote = !inQuote;
      quoted = true;
      started = true;
      continue;
    }
    if (!inQuote && /\s/.test(ch)) {
      if (started) {
        tokens.push({ text: current, quoted });
      }
      current = "";
      quoted = false;
      started = false;
      continue;
    }
    current += ch;
    started = true;
  }

  if (inQuote) {
    return undefined;
  }
  if (started) {
    tokens.push({ text: current, quoted });
  }
  return tokens.filter((token) => token.text.length > 0);
}

/** Quoted input stays quoted so its contents never act as query syntax. */
function render(token: Token): string {
  return token.quoted ? `"${token.text}"` : token.text;
}

/**
 * Default normalizer.
 *
 * Supported inline syntax:
 * - `from:<handle|did>` restricts to posts by that account
 * - `mentions:<handle|did>` restricts to posts mentioning that account
 * - `lang:<code>` restricts to one language
 *
 * Handles that cannot be resolved stay in the text as typed.
 */
export function makeQueryNormalizer(resolver: IdentityResolver): QueryNormalizer {
  const resolveActor = (value: string): Effect.Effect<Option.Option<string>> => {
    const handle = value.startsWith("@") ? value.slice(1) : value;
    if (DID_PATTERN.test(handle)) {
      return Effect.succeed(Option.some(handle));
    }
    if (!HANDLE_PATTERN.test(handle)) {
      return Effect.succeed(Option.none());
    }
    return resolver.resolveHandle(handle.toLowerCase()).pipe(
      Effect.map(Option.some),
      Effect.catchAll((error) =>
        Effect.logWarning("[SEARCH] Could not resolve handle in query").pipe(
          Effect.annotateLogs({ handle, error: error.message }),
          Effect.as(Option.none())
        )
      )
    );
  };

  const actorFilter = (field: string, value: string) =>
    resolveActor(value).pipe(
      Effect.map(
        Option.map((did): FilterClause => ({ kind: "term", field, value: did }))
      )
    );

  const operatorFilter = (
    token: Token
  ): Effect.Effect<Option.Option<FilterClause>> => {
    if (token.quoted) {
      return Effect.succeed(Option.none());
    }
    const colon = token.text.indexOf(":");
    if (colon <= 0) {
      return Effect.succeed(Option.none());
    }
    const name = token.text.slice(0, colon);
    const value = token.text.slice(colon + 1);
    switch (name) {
      case "from":
        return actorFilter("did", value);
      case "mentions":
        return actorFilter("mention_did", value);
      case "lang": {
        if (!LANG_PATTERN.test(value)) {
          return Effect.succeed(Option.none());
        }
        const filter: FilterClause = { kind: "term", field: "lang", value: value.toLowerCase() };
        return Effect.succeed(Option.some(filter));
      }
      default:
        return Effect.succeed(Option.none());
    }
  };

  return {
    normalize: (raw) =>
      Effect.gen(function* () {
        const tokens = splitQuery(raw);
        if (tokens === undefined) {
          return { query: raw, filters: [] };
        }

        const keep: string[] = [];
        const filters: FilterClause[] = [];
        for (const token of tokens) {
          const filter = yield* operatorFilter(token);
          if (Option.isSome(filter)) {
            filters.push(filter.value);
          } else {
            keep.push(render(token));
          }
        }

        const query = keep.join(" ");
        if (query === "" && filters.length > 0) {
          return { query: "*", filters };
        }
        return { query, filters };
      }),
  };
}
