/**
 * Search service module.
 *
 * Re-exports the public search components. The unrestricted passthrough
 * lives in `./diagnostic` and is deliberately absent here.
 */

export type { BackendRequest, BackendResponse, SearchBackend } from "./client";
export { OpenSearchBackend } from "./opensearch";
export {
  compilePostSearch,
  compileProfileSearch,
  compileTypeahead,
  compileTypeaheadStructured,
} from "./compiler";
export { executeSearch } from "./executor";
export type { ExecuteOptions } from "./executor";
export {
  IdentityResolutionError,
  makeXrpcIdentityResolver,
} from "./identity";
export type { IdentityResolver } from "./identity";
export { makeQueryNormalizer } from "./normalizer";
export type { NormalizedQuery, QueryNormalizer } from "./normalizer";
export { MAX_OFFSET, MAX_SIZE, checkParams } from "./pagination";
export { toDocument } from "./query";
export type { CompiledQuery, FilterClause, ScoringClause } from "./query";
export {
  PostDocument,
  ProfileDocument,
  decodeHits,
  decodeSearchResponse,
} from "./response";
export {
  searchActors,
  searchPosts,
  searchPostsStructured,
  searchProfiles,
  searchProfilesStructured,
  searchProfilesTypeahead,
  searchProfilesTypeaheadStructured,
} from "./search";
export type { ExecutionContext, SearchContext } from "./search";
export type {
  ActorSearchQuery,
  ExecutionError,
  PaginationRequest,
  PostSearchQuery,
  SearchFailure,
  SearchHit,
  SearchResponse,
} from "./types";
export {
  BackendError,
  DecodeError,
  InvalidParamsError,
  SerializationError,
  TransportError,
} from "./types";
