import { describe, expect, it } from "vitest";
import {
  compilePostSearch,
  compileProfileSearch,
  compileTypeahead,
  compileTypeaheadStructured,
  compileUnrestricted,
} from "./compiler";
import type { NormalizedQuery } from "./normalizer";
import { toDocument } from "./query";

const NOW = new Date("2024-06-01T12:00:00.000Z");

const cats: NormalizedQuery = { query: "cats", filters: [] };

const fullText = {
  simple_query_string: {
    query: "cats",
    fields: ["everything"],
    flags: "AND|NOT|OR|PHRASE|PRECEDENCE|WHITESPACE",
    default_operator: "and",
    lenient: true,
    analyze_wildcard: false,
  },
};

const typeahead = (query: string) => ({
  multi_match: {
    query,
    type: "bool_prefix",
    operator: "and",
    fields: ["typeahead", "typeahead._2gram", "typeahead._3gram"],
  },
});

describe("compilePostSearch", () => {
  it("bounds creation time by now when no range is requested", () => {
    const document = toDocument(compilePostSearch({ query: "cats", offset: 0, size: 10 }, cats, NOW));

    expect(document).toEqual({
      query: {
        bool: {
          must: fullText,
          filter: [{ range: { created_at: { lte: "2024-06-01T12:00:00.000Z" } } }],
        },
      },
      sort: { created_at: { order: "desc" } },
      size: 10,
      from: 0,
    });
  });

  it("keeps the now upper bound alongside an explicit lower bound", () => {
    const compiled = compilePostSearch(
      { query: "cats", offset: 0, size: 10, from: new Date("2024-01-01T00:00:00Z") },
      cats,
      NOW
    );

    expect(compiled.query).toMatchObject({
      kind: "bool",
      filter: [
        {
          kind: "range",
          field: "created_at",
          gte: "2024-01-01T00:00:00.000Z",
          lte: "2024-06-01T12:00:00.000Z",
        },
      ],
    });
  });

  it("replaces the now upper bound with an explicit one", () => {
    const compiled = compilePostSearch(
      { query: "cats", offset: 0, size: 10, to: new Date("2023-12-31T23:59:59Z") },
      cats,
      NOW
    );
    const document = toDocument(compiled);

    expect(document.query).toEqual({
      bool: {
        must: fullText,
        filter: [{ range: { created_at: { lte: "2023-12-31T23:59:59.000Z" } } }],
      },
    });
  });

  it("adds one terms filter per non-empty facet, after the extracted filters", () => {
    const compiled = compilePostSearch(
      {
        query: "cats",
        offset: 20,
        size: 5,
        actors: ["did:plc:abc"],
        tags: ["caturday"],
        langs: ["en", "ja"],
      },
      { query: "cats", filters: [{ kind: "term", field: "did", value: "did:plc:author" }] },
      NOW
    );

    expect(toDocument(compiled)).toMatchObject({
      query: {
        bool: {
          filter: [
            { term: { did: "did:plc:author" } },
            { range: { created_at: { lte: "2024-06-01T12:00:00.000Z" } } },
            { terms: { did: ["did:plc:abc"] } },
            { terms: { tag: ["caturday"] } },
            { terms: { lang: ["en", "ja"] } },
          ],
        },
      },
      size: 5,
      from: 20,
    });
  });

  it("emits only the actor facet when tags and languages are empty", () => {
    const compiled = compilePostSearch(
      { query: "cats", offset: 0, size: 10, actors: ["did:plc:abc"], tags: [], langs: [] },
      cats,
      NOW
    );

    expect(compiled.query).toMatchObject({
      filter: [
        { kind: "range", field: "created_at" },
        { kind: "terms", field: "did", values: ["did:plc:abc"] },
      ],
    });
  });

  it("never adds a should clause", () => {
    const document = toDocument(compilePostSearch({ query: "cats", offset: 0, size: 10 }, cats, NOW));
    expect(document.query).not.toHaveProperty("bool.should");
  });

  it("is deterministic for a fixed clock", () => {
    const q = { query: "cats", offset: 0, size: 10, tags: ["a", "b"] };
    expect(toDocument(compilePostSearch(q, cats, NOW))).toEqual(
      toDocument(compilePostSearch(q, cats, NOW))
    );
  });
});

describe("compileProfileSearch", () => {
  it("adds optional avatar and banner boosts and sorts by pagerank", () => {
    const document = toDocument(compileProfileSearch({ offset: 0, size: 25 }, cats));

    expect(document).toEqual({
      query: {
        bool: {
          must: fullText,
          should: [{ term: { has_avatar: true } }, { term: { has_banner: true } }],
          minimum_should_match: 0,
          filter: [],
          boost: 0.5,
        },
      },
      sort: { pagerank: { order: "desc" } },
      size: 25,
      from: 0,
    });
  });

  it("restricts to the following set when one is given", () => {
    const document = toDocument(
      compileProfileSearch(
        { offset: 0, size: 25, following: ["did:plc:x", "did:plc:y"] },
        { query: "cats", filters: [{ kind: "term", field: "lang", value: "en" }] }
      )
    );

    expect(document).toMatchObject({
      query: {
        bool: {
          should: [{ term: { has_avatar: true } }, { term: { has_banner: true } }],
          minimum_should_match: 0,
          boost: 0.5,
          filter: [{ term: { lang: "en" } }, { terms: { did: ["did:plc:x", "did:plc:y"] } }],
        },
      },
    });
  });

  it("ignores an empty following set", () => {
    const compiled = compileProfileSearch({ offset: 0, size: 25, following: [] }, cats);
    expect(compiled.query).toMatchObject({ kind: "bool", filter: [] });
  });
});

describe("compileTypeahead", () => {
  it("matches the prefix over the three typeahead fields without an offset", () => {
    expect(toDocument(compileTypeahead("ali", 5))).toEqual({
      query: typeahead("ali"),
      sort: { pagerank: { order: "desc" } },
      size: 5,
    });
  });
});

describe("compileTypeaheadStructured", () => {
  it("adds exactly one terms filter for the following set", () => {
    const document = toDocument(
      compileTypeaheadStructured({
        query: "ali",
        offset: 10,
        size: 5,
        following: ["did:plc:x"],
        typeahead: true,
      })
    );

    expect(document).toEqual({
      query: {
        bool: {
          must: typeahead("ali"),
          filter: [{ terms: { did: ["did:plc:x"] } }],
        },
      },
      sort: { pagerank: { order: "desc" } },
      size: 5,
      from: 10,
    });
  });

  it("has no filters without a following set", () => {
    const document = toDocument(
      compileTypeaheadStructured({ query: "ali", offset: 0, size: 5, typeahead: true })
    );
    expect(document.query).toEqual({ bool: { must: typeahead("ali"), filter: [] } });
  });
});

describe("compileUnrestricted", () => {
  it("passes the expression to query_string with backend defaults for paging", () => {
    expect(toDocument(compileUnrestricted("handle:alice* AND NOT lang:ja"))).toEqual({
      query: {
        query_string: {
          query: "handle:alice* AND NOT lang:ja",
          default_operator: "and",
          analyze_wildcard: true,
          allow_leading_wildcard: false,
          lenient: true,
          default_field: "everything",
        },
      },
    });
  });
});
