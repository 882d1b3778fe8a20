// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema } from "./schema.ts";
import type { AppConfig } from "./schema.ts";

export type {
  AppConfig,
  RegistryConfig,
  SearchConfig,
  CatalogConfig,
  DatabaseConfig,
} from "./schema.ts";

/**
 * Load `config.toml` (or the given path) and validate it. A missing file yields the
 * defaults, since every section has one; `DATABASE_URL` overrides `database.url`.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? "config.toml");
  const parsed: Record<string, unknown> = existsSync(resolvedPath)
    ? TOML.parse(readFileSync(resolvedPath, "utf-8"))
    : {};

  const envOverrides: Record<string, unknown> = {};

  if (process.env["DATABASE_URL"]) {
    envOverrides["database"] = { url: process.env["DATABASE_URL"] };
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}
