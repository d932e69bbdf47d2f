import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { LlmProvider, LlmSettings } from "./generation";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env (one level above src/); otherwise use the default lookup.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type EmbeddingProvider = "local" | "openai";

export interface Config {
  DOCS_ROOT: string;
  VERBOSE: boolean;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  RETRIEVAL_K: number;
  AGENT_MAX_ITERATIONS: number;
  EMBEDDING_PROVIDER: EmbeddingProvider;
  EMBEDDING_MODEL: string | undefined;
  /** Key / endpoint for EMBEDDING_PROVIDER=openai. */
  EMBEDDING_API_KEY: string | undefined;
  EMBEDDING_BASE_URL: string | undefined;
  LLM: LlmSettings;
  MCP_TRANSPORT: string;
  HTTP: HttpSettings;
  /** Model download directory for local embeddings; undefined = project .cache/transformers. */
  TRANSFORMERS_CACHE: string | undefined;
}

export interface HttpSettings {
  port: number;
  host: string;
  /** Explicit host[:port] whitelist; undefined = local-only defaults. */
  allowedHosts: string[] | undefined;
  dnsRebindingProtection: boolean;
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  anthropic: "claude-3-5-sonnet-20241022",
  openai: "gpt-4o-mini",
  local: "llama3.1",
};

/** Tolerant truthy parsing (supports several common forms). */
export function parseBool(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Parse an integer env value; falls back to `def` when unset or invalid and
 * clamps into [min, max].
 */
export function parseIntInRange(raw: string | undefined, def: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return def;
  const n = Number(s);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : def;
}

/** Same as {@link parseIntInRange} for fractional values. */
export function parseFloatInRange(raw: string | undefined, def: number, min: number, max: number): number {
  const s = raw?.trim();
  if (!s) return def;
  const n = Number(s);
  return Number.isFinite(n) && n >= min ? Math.min(max, n) : def;
}

function parseProvider(raw: string | undefined): LlmProvider {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "openai" || v === "local" ? v : "anthropic";
}

/**
 * Read every runtime knob from the environment. Pure apart from reading
 * `env`; pass a custom object in tests.
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): Config {
  // Directory ingest_document paths are resolved against (and may not escape).
  const DOCS_ROOT = path.resolve(env.DOCS_ROOT?.trim() || process.cwd());

  const VERBOSE = parseBool(env.VERBOSE);

  // Chunk sizing (defaults 1000 / 200). An overlap that is not smaller than
  // the size is kept as-is here and rejected by the chunker with a ConfigError.
  const CHUNK_SIZE = parseIntInRange(env.CHUNK_SIZE, 1000, 1, 8000);
  const CHUNK_OVERLAP = parseIntInRange(env.CHUNK_OVERLAP, 200, 0, 4000);

  const RETRIEVAL_K = parseIntInRange(env.RETRIEVAL_K, 4, 1, 50);
  const AGENT_MAX_ITERATIONS = parseIntInRange(env.AGENT_MAX_ITERATIONS, 3, 1, 20);

  const EMBEDDING_PROVIDER: EmbeddingProvider =
    (env.EMBEDDING_PROVIDER ?? "").trim().toLowerCase() === "openai" ? "openai" : "local";
  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || undefined;
  const EMBEDDING_API_KEY = env.EMBEDDING_API_KEY?.trim() || env.OPENAI_API_KEY?.trim() || undefined;
  const EMBEDDING_BASE_URL = env.EMBEDDING_BASE_URL?.trim() || undefined;

  const provider = parseProvider(env.LLM_PROVIDER);
  const providerKey = provider === "anthropic" ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
  const LLM: LlmSettings = {
    provider,
    modelId: env.LLM_MODEL?.trim() || DEFAULT_MODELS[provider],
    apiKey: env.LLM_API_KEY?.trim() || providerKey?.trim() || undefined,
    baseURL: env.LLM_BASE_URL?.trim() || undefined,
    maxTokens: parseIntInRange(env.LLM_MAX_TOKENS, 4096, 1, 200000),
    temperature: parseFloatInRange(env.LLM_TEMPERATURE, 0.7, 0, 2),
    topP: parseFloatInRange(env.LLM_TOP_P, 0.9, 0, 1),
    maxRetries: parseIntInRange(env.LLM_MAX_RETRIES, 2, 0, 10),
  };

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  const allowedHosts = (env.ALLOWED_HOSTS ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  const HTTP: HttpSettings = {
    port: parseIntInRange(env.MCP_PORT, 3000, 1, 65535),
    host: env.HOST?.trim() || "127.0.0.1",
    allowedHosts: allowedHosts.length > 0 ? allowedHosts : undefined,
    // Enabled unless explicitly set to "false".
    dnsRebindingProtection: (env.ENABLE_DNS_REBINDING_PROTECTION ?? "true").trim().toLowerCase() !== "false",
  };

  const TRANSFORMERS_CACHE = env.TRANSFORMERS_CACHE?.trim() || undefined;

  return {
    DOCS_ROOT,
    VERBOSE,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    RETRIEVAL_K,
    AGENT_MAX_ITERATIONS,
    EMBEDDING_PROVIDER,
    EMBEDDING_MODEL,
    EMBEDDING_API_KEY,
    EMBEDDING_BASE_URL,
    LLM,
    MCP_TRANSPORT,
    HTTP,
    TRANSFORMERS_CACHE,
  };
}
