// pattern: Functional Core
import { z } from "zod";

const RegistryConfigSchema = z.object({
  token_url: z.string().url().default("https://icdaccessmanagement.who.int/connect/token"),
  base_url: z.string().url().default("https://id.who.int/icd/release/11"),
  release: z.string().min(1).default("2024-01"),
  linearization: z.string().min(1).default("mms"),
  scope: z.string().min(1).default("icdapi_access"),
  api_version: z.string().min(1).default("v2"),
  language: z.string().min(2).default("es"),
  request_timeout: z.number().int().positive().default(15000),
  token_safety_margin: z.number().int().nonnegative().default(60000),
  credentials_path: z.string().default("registry-credentials.toml"),
});

const SearchConfigSchema = z.object({
  min_query_length: z.number().int().positive().default(3),
  default_limit: z.number().int().positive().max(500).default(25),
  offline_limit: z.number().int().positive().default(50),
});

const CatalogConfigSchema = z.object({
  seed_path: z.string().default("data/icd11_mms_es.json"),
  batch_size: z.number().int().positive().default(1000),
});

const DatabaseConfigSchema = z.object({
  url: z.string().url().optional(),
});

const AppConfigSchema = z.object({
  registry: RegistryConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
});

const ClientCredentialsFileSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

export {
  AppConfigSchema,
  RegistryConfigSchema,
  SearchConfigSchema,
  CatalogConfigSchema,
  DatabaseConfigSchema,
  ClientCredentialsFileSchema,
};
