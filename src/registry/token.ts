// pattern: Imperative Shell

/**
 * OAuth2 client-credentials token lifecycle for the registry.
 *
 * The manager is the only owner of the bearer credential. A credential is handed out only
 * while `expiresAt` (stored already reduced by the safety margin) lies in the future. The
 * margin never exceeds half of the token's declared lifetime.
 * Refreshes are single-flight: concurrent callers share one pending token request.
 */

import { z } from "zod";
import type { RegistryConfig } from "../config/schema.ts";
import { LookupError, describeError } from "../errors.ts";
import type { Credential, CredentialStore, TokenManager } from "./types.ts";

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});

type TokenManagerOptions = {
  readonly config: Pick<
    RegistryConfig,
    "token_url" | "scope" | "request_timeout" | "token_safety_margin"
  >;
  readonly credentials: CredentialStore;
  readonly now?: () => number;
};

export function createTokenManager(options: TokenManagerOptions): TokenManager {
  const { config, credentials } = options;
  const now = options.now ?? Date.now;

  let cached: Credential | null = null;
  let inFlight: Promise<Credential> | null = null;

  async function requestToken(): Promise<Credential> {
    const { clientId, clientSecret } = await credentials.load();

    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
      scope: config.scope,
    });

    let response: Response;
    try {
      response = await fetch(config.token_url, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        signal: AbortSignal.timeout(config.request_timeout),
      });
    } catch (error) {
      throw new LookupError("auth", `token request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new LookupError(
        "auth",
        `token request rejected: ${response.status} ${response.statusText}`,
        { status: response.status },
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new LookupError("auth", "token response is not valid JSON", { cause: error });
    }

    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LookupError("auth", "token response is missing access_token or expires_in", {
        cause: parsed.error,
      });
    }

    // a short-lived token keeps at least half its lifetime
    const lifetime = parsed.data.expires_in * 1000;
    const margin = Math.min(config.token_safety_margin, lifetime / 2);
    return {
      bearerToken: parsed.data.access_token,
      expiresAt: now() + lifetime - margin,
    };
  }

  function refresh(): Promise<Credential> {
    if (inFlight) {
      return inFlight;
    }

    inFlight = requestToken()
      .then((credential) => {
        cached = credential;
        return credential;
      })
      .finally(() => {
        inFlight = null;
      });

    return inFlight;
  }

  return {
    async getValidCredential(): Promise<Credential> {
      if (cached && cached.expiresAt > now()) {
        return cached;
      }
      cached = null;
      return refresh();
    },

    invalidate(rejectedToken?: string): void {
      // a late 401 for an older token must not evict a newer one
      if (rejectedToken !== undefined && cached?.bearerToken !== rejectedToken) {
        return;
      }
      cached = null;
    },
  };
}
