// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { ClientCredentialsFileSchema } from "../config/schema.ts";
import { LookupError, describeError } from "../errors.ts";
import type { ClientCredentials, CredentialStore } from "./types.ts";

/**
 * Reads registry client credentials from a local TOML file that is kept out of version
 * control. REGISTRY_CLIENT_ID and REGISTRY_CLIENT_SECRET, when both are set, win over the file.
 */
export function createFileCredentialStore(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): CredentialStore {
  const resolvedPath = resolve(path);

  return {
    async load(): Promise<ClientCredentials> {
      const envId = env["REGISTRY_CLIENT_ID"];
      const envSecret = env["REGISTRY_CLIENT_SECRET"];
      if (envId && envSecret) {
        return { clientId: envId, clientSecret: envSecret };
      }

      let raw: string;
      try {
        raw = await readFile(resolvedPath, "utf-8");
      } catch (error) {
        throw new LookupError(
          "config",
          `registry credentials file not found at ${resolvedPath}; create it with clientId and clientSecret`,
          { cause: error },
        );
      }

      let parsed: unknown;
      try {
        parsed = TOML.parse(raw);
      } catch (error) {
        throw new LookupError(
          "config",
          `registry credentials file ${resolvedPath} is not valid TOML: ${describeError(error)}`,
          { cause: error },
        );
      }

      const result = ClientCredentialsFileSchema.safeParse(parsed);
      if (!result.success) {
        throw new LookupError(
          "config",
          `registry credentials file ${resolvedPath} must define clientId and clientSecret as strings`,
          { cause: result.error },
        );
      }

      return result.data;
    },
  };
}
