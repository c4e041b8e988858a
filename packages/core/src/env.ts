// packages/core/src/env.ts
import { z } from "zod";

export const DataSourceSchema = z.enum(["amazon", "ibm_store"]);

export const EnvSchema = z.object({
  // Ollama (dialogue model)
  OLLAMA_URL: z.string().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().default("qwen2.5:7b-instruct"),

  // Discovery (search backend)
  DISCOVERY_URL: z.string().optional(),
  DISCOVERY_API_KEY: z.string().optional(),
  DISCOVERY_ENVIRONMENT_ID: z.string().optional(),
  DISCOVERY_COLLECTION_ID: z.string().optional(),
  DISCOVERY_VERSION: z.string().default("2018-12-03"),
  DISCOVERY_DATA_SOURCE: DataSourceSchema.default("ibm_store"),
  // Minimum relevance score; 0 disables filtering. Anything unparseable falls back to 0.
  DISCOVERY_SCORE_FILTER: z.coerce.number().min(0).max(1).catch(0),
  // Fetch more than we keep so the score filter still has candidates left.
  DISCOVERY_QUERY_COUNT: z.coerce.number().int().positive().default(10),
  DISCOVERY_KEEP_COUNT: z.coerce.number().int().positive().default(5),

  // Customer store
  STORE_PATH: z.string().optional(),

  // Loop
  POLL_INTERVAL_MS: z.coerce.number().int().nonnegative().default(500),
  MAX_AUTO_TURNS: z.coerce.number().int().positive().default(10),

  // Terminal channel
  BOT_ID: z.string().default("UBOT"),
  CLI_USER_EMAIL: z.string().default("shopper@example.com"),
  CLI_FIRST_NAME: z.string().default("Sam"),
  CLI_LAST_NAME: z.string().default("Shopper"),
  OUTPUT_CHAR_DELAY_MS: z.coerce.number().nonnegative().default(0),

  // Debug
  LOG_LEVEL: z.string().default("info"),
  STORE_DEBUG: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export type DiscoverySettings = {
  url: string;
  apiKey: string;
  environmentId: string;
  collectionId: string;
  version: string;
};

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  // Empty strings from .env should behave like unset values.
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v != null && v.trim() !== ""),
  );
  return EnvSchema.parse(cleaned);
}

export function isDebug(env: Env): boolean {
  return (env.STORE_DEBUG ?? "").trim() === "1";
}

/** Search is only wired up when every connection setting is present. */
export function discoverySettings(env: Env): DiscoverySettings | null {
  const url = (env.DISCOVERY_URL ?? "").trim();
  const apiKey = (env.DISCOVERY_API_KEY ?? "").trim();
  const environmentId = (env.DISCOVERY_ENVIRONMENT_ID ?? "").trim();
  const collectionId = (env.DISCOVERY_COLLECTION_ID ?? "").trim();
  if (!url || !apiKey || !environmentId || !collectionId) return null;
  return { url, apiKey, environmentId, collectionId, version: env.DISCOVERY_VERSION };
}
