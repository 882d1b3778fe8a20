// pattern: Functional Core (barrel export)

export type {
  ClientCredentials,
  CredentialStore,
  Credential,
  TokenManager,
  SearchResult,
  SearchQuery,
  RemoteSearchClient,
} from "./types.ts";
export { createFileCredentialStore } from "./credentials.ts";
export { createTokenManager } from "./token.ts";
export { createRemoteSearchClient } from "./client.ts";
export { parseSearchResponse } from "./parse.ts";
export { stripMarkup } from "./markup.ts";
