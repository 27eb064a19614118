import { Effect, TestClock, TestContext } from "effect";
import { describe, expect, it } from "vitest";
import {
  searchActors,
  searchPosts,
  searchPostsStructured,
  searchProfiles,
  searchProfilesStructured,
  searchProfilesTypeahead,
  searchProfilesTypeaheadStructured,
} from "./search";
import { fixedBackend, literalNormalizer } from "./testing";
import type { SearchFailure, SearchResponse } from "./types";

const NOW = Date.parse("2024-06-01T12:00:00.000Z");

/** Run with the test clock set to NOW. */
function run<A, E>(program: Effect.Effect<A, E>) {
  return Effect.runPromise(
    TestClock.setTime(NOW).pipe(Effect.zipRight(program), Effect.provide(TestContext.TestContext))
  );
}

function fail(program: Effect.Effect<SearchResponse, SearchFailure>) {
  return run(Effect.flip(program));
}

describe("searchPostsStructured", () => {
  it("uses the clock for the default upper bound", async () => {
    const { backend, sentDocument } = fixedBackend([]);
    const ctx = { backend, normalizer: literalNormalizer, index: "posts" };

    await run(
      searchPostsStructured(ctx, {
        query: "cats",
        offset: 0,
        size: 10,
        from: new Date("2024-01-01T00:00:00Z"),
      })
    );

    expect(sentDocument()).toMatchObject({
      query: {
        bool: {
          filter: [
            {
              range: {
                created_at: {
                  gte: "2024-01-01T00:00:00.000Z",
                  lte: "2024-06-01T12:00:00.000Z",
                },
              },
            },
          ],
        },
      },
      sort: { created_at: { order: "desc" } },
    });
  });

  it("rejects bad pagination before touching the backend", async () => {
    const { backend, requests } = fixedBackend([]);
    const ctx = { backend, normalizer: literalNormalizer, index: "posts" };

    const error = await fail(searchPostsStructured(ctx, { query: "cats", offset: 9999, size: 2 }));

    expect(error._tag).toBe("InvalidParamsError");
    expect(requests).toHaveLength(0);
  });

  it("rejects an invalid timestamp", async () => {
    const { backend, requests } = fixedBackend([]);
    const ctx = { backend, normalizer: literalNormalizer, index: "posts" };

    const error = await fail(
      searchPostsStructured(ctx, { query: "cats", offset: 0, size: 10, to: new Date("nope") })
    );

    expect(error).toMatchObject({ _tag: "InvalidParamsError", message: "invalid to timestamp" });
    expect(requests).toHaveLength(0);
  });
});

describe("searchPosts", () => {
  it("compiles the same document as the structured variant without facets", async () => {
    const plain = fixedBackend([]);
    const structured = fixedBackend([]);

    await run(
      searchPosts({ backend: plain.backend, normalizer: literalNormalizer, index: "posts" }, "cats", 5, 10)
    );
    await run(
      searchPostsStructured(
        { backend: structured.backend, normalizer: literalNormalizer, index: "posts" },
        { query: "cats", offset: 5, size: 10 }
      )
    );

    expect(plain.sentDocument()).toEqual(structured.sentDocument());
  });
});

describe("searchProfiles", () => {
  it("boosts by avatar and banner regardless of facets", async () => {
    const { backend, sentDocument } = fixedBackend([]);

    await run(searchProfiles({ backend, normalizer: literalNormalizer, index: "profiles" }, "alice", 0, 25));

    expect(sentDocument()).toMatchObject({
      query: {
        bool: {
          should: [{ term: { has_avatar: true } }, { term: { has_banner: true } }],
          minimum_should_match: 0,
          boost: 0.5,
        },
      },
      sort: { pagerank: { order: "desc" } },
    });
  });
});

describe("searchProfilesStructured", () => {
  it("filters by the following set", async () => {
    const { backend, sentDocument } = fixedBackend([]);

    await run(
      searchProfilesStructured(
        { backend, normalizer: literalNormalizer, index: "profiles" },
        { query: "alice", offset: 0, size: 25, following: ["did:plc:x"], typeahead: false }
      )
    );

    expect(sentDocument()).toMatchObject({
      query: { bool: { filter: [{ terms: { did: ["did:plc:x"] } }], boost: 0.5 } },
    });
  });
});

describe("searchProfilesTypeahead", () => {
  it("validates the size against a zero offset", async () => {
    const { backend, requests } = fixedBackend([]);

    const error = await fail(searchProfilesTypeahead({ backend, index: "profiles" }, "ali", 251));

    expect(error._tag).toBe("InvalidParamsError");
    expect(requests).toHaveLength(0);
  });

  it("sends the prefix verbatim", async () => {
    const { backend, sentDocument } = fixedBackend([]);

    await run(searchProfilesTypeahead({ backend, index: "profiles" }, "from:ali", 5));

    expect(sentDocument()).toMatchObject({
      query: { multi_match: { query: "from:ali", type: "bool_prefix" } },
      size: 5,
    });
    expect(sentDocument()).not.toHaveProperty("from");
  });
});

describe("searchProfilesTypeaheadStructured", () => {
  it("validates the offset like the other paged shapes", async () => {
    const { backend } = fixedBackend([]);

    const error = await fail(
      searchProfilesTypeaheadStructured(
        { backend, index: "profiles" },
        { query: "ali", offset: 10000, size: 1, typeahead: true }
      )
    );

    expect(error._tag).toBe("InvalidParamsError");
  });
});

describe("searchActors", () => {
  it("takes the typeahead path when asked to", async () => {
    const { backend, sentDocument } = fixedBackend([]);
    const ctx = { backend, normalizer: literalNormalizer, index: "profiles" };

    await run(searchActors(ctx, { query: "ali", offset: 0, size: 5, typeahead: true }));

    expect(sentDocument()).toMatchObject({
      query: { bool: { must: { multi_match: { query: "ali" } } } },
    });
  });

  it("takes the relevance path otherwise", async () => {
    const { backend, sentDocument } = fixedBackend([]);
    const ctx = { backend, normalizer: literalNormalizer, index: "profiles" };

    await run(searchActors(ctx, { query: "ali", offset: 0, size: 5, typeahead: false }));

    expect(sentDocument()).toMatchObject({
      query: { bool: { must: { simple_query_string: { query: "ali" } }, boost: 0.5 } },
    });
  });
});
