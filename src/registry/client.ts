// pattern: Imperative Shell

import type { RegistryConfig, SearchConfig } from "../config/schema.ts";
import { LookupError, describeError } from "../errors.ts";
import { parseSearchResponse } from "./parse.ts";
import type { RemoteSearchClient, SearchResult, TokenManager } from "./types.ts";

type RemoteSearchClientOptions = {
  readonly registry: Pick<
    RegistryConfig,
    "base_url" | "release" | "linearization" | "api_version" | "language" | "request_timeout"
  >;
  readonly search: Pick<SearchConfig, "min_query_length" | "default_limit">;
  readonly tokens: TokenManager;
};

export function createRemoteSearchClient(options: RemoteSearchClientOptions): RemoteSearchClient {
  const { registry, search, tokens } = options;
  const searchEndpoint = `${registry.base_url.replace(/\/+$/, "")}/${registry.release}/${registry.linearization}/search`;

  async function send(url: URL, bearerToken: string, language: string): Promise<Response> {
    try {
      return await fetch(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${bearerToken}`,
          "API-Version": registry.api_version,
          "Accept-Language": language,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(registry.request_timeout),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new LookupError("network", "registry search timed out", { cause: error });
      }
      throw new LookupError("network", `registry search failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async function readResults(response: Response): Promise<Array<SearchResult>> {
    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new LookupError("parse", "registry search response is not valid JSON", {
        cause: error,
      });
    }
    return parseSearchResponse(payload);
  }

  return {
    async search(
      text: string,
      offset = 0,
      limit = search.default_limit,
      language = registry.language,
    ): Promise<ReadonlyArray<SearchResult>> {
      const trimmed = text.trim();
      if (trimmed.length < search.min_query_length) {
        return [];
      }

      const url = new URL(searchEndpoint);
      url.searchParams.set("q", trimmed);
      url.searchParams.set("flatResults", "true");
      url.searchParams.set("offset", String(offset));
      url.searchParams.set("limit", String(limit));

      const credential = await tokens.getValidCredential();
      let response = await send(url, credential.bearerToken, language);

      // The token can expire server-side before our own clock says so: refresh and retry once.
      if (response.status === 401) {
        tokens.invalidate(credential.bearerToken);
        const renewed = await tokens.getValidCredential();
        response = await send(url, renewed.bearerToken, language);

        if (!response.ok) {
          throw new LookupError(
            "auth",
            `registry rejected the renewed credential: ${response.status} ${response.statusText}`,
            { status: response.status },
          );
        }
      }

      if (!response.ok) {
        throw new LookupError(
          "network",
          `registry search failed: ${response.status} ${response.statusText}`,
          { status: response.status },
        );
      }

      return readResults(response);
    },
  };
}
