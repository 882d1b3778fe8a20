// pattern: Functional Core

/**
 * Shared types for the classification registry integration.
 * The remote client and the offline index both normalise to SearchResult.
 */

export type ClientCredentials = {
  readonly clientId: string;
  readonly clientSecret: string;
};

export interface CredentialStore {
  load(): Promise<ClientCredentials>;
}

export type Credential = {
  readonly bearerToken: string;
  /** Epoch milliseconds, already reduced by the safety margin. */
  readonly expiresAt: number;
};

export interface TokenManager {
  getValidCredential(): Promise<Credential>;
  /** Drop the cached credential; with a token, only if it is still the cached one. */
  invalidate(rejectedToken?: string): void;
}

export type SearchResult = {
  readonly externalId: string;
  readonly code?: string;
  readonly title: string;
  readonly chapterHint?: string;
  readonly relevanceScore?: number;
};

export type SearchQuery = {
  readonly text: string;
  readonly offset: number;
  readonly limit: number;
  readonly language: string;
};

export interface RemoteSearchClient {
  search(
    text: string,
    offset?: number,
    limit?: number,
    language?: string,
  ): Promise<ReadonlyArray<SearchResult>>;
}
