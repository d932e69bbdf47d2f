/**
 * Application entry point.
 *
 * High‑level flow:
 * 1. Load environment configuration (single dotenv call inside ./config).
 * 2. For local embeddings, point the transformers model cache at a
 *    project-local (or TRANSFORMERS_CACHE) directory and load the model
 *    eagerly so the first ingest is not slowed by the download.
 * 3. Build the generation model client for the configured provider.
 * 4. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): per-client
 *        sessions plus a /health endpoint.
 *
 * Each MCP session gets its own document chat session and research agent;
 * see ./server for the tool list. Environment variables are documented in
 * .env.example.
 */
import { getConfig, type Config } from "./config";
import { configureTransformersCache } from "./cache";
import { DEFAULT_LOCAL_EMBEDDING_MODEL, Embeddings, HostedEmbeddings, type EmbeddingGateway } from "./embeddings";
import { AiSdkGeneration, createEmbeddingModel, createLanguageModel } from "./generation";
import { createServer } from "./server";
import { statusManager } from "./status";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const DEFAULT_HOSTED_EMBEDDING_MODEL = "text-embedding-3-small";

const config: Config = getConfig();
statusManager.setDocsRoot(config.DOCS_ROOT);

let embeddings: EmbeddingGateway;
if (config.EMBEDDING_PROVIDER === "openai") {
  embeddings = new HostedEmbeddings(
    createEmbeddingModel(
      config.EMBEDDING_MODEL ?? DEFAULT_HOSTED_EMBEDDING_MODEL,
      config.EMBEDDING_API_KEY,
      config.EMBEDDING_BASE_URL,
    ),
    config.LLM.maxRetries,
  );
} else {
  // Must happen before any pipeline is created.
  await configureTransformersCache(config.TRANSFORMERS_CACHE).catch((e) =>
    console.error("[MCP] Failed to set TRANSFORMERS cache directory:", e),
  );
  embeddings = new Embeddings(config.EMBEDDING_MODEL ?? DEFAULT_LOCAL_EMBEDDING_MODEL);
}
await embeddings.init();

const generation = new AiSdkGeneration(createLanguageModel(config.LLM), config.LLM);
statusManager.setModels(embeddings.getModelName(), generation.modelId);
console.error(
  `[MCP] Embeddings: ${embeddings.getModelName()} | Generation: ${config.LLM.provider}/${generation.modelId} | Docs: ${config.DOCS_ROOT}`,
);

const newSession = () =>
  createServer({
    embeddings,
    generation,
    docsRoot: config.DOCS_ROOT,
    chunkSize: config.CHUNK_SIZE,
    chunkOverlap: config.CHUNK_OVERLAP,
    topK: config.RETRIEVAL_K,
    maxIterations: config.AGENT_MAX_ITERATIONS,
    verbose: config.VERBOSE,
  });

statusManager.markReady();
const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";
if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(newSession, config.HTTP);
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(newSession);
}
