/**
 * Error taxonomy shared by the RAG pipeline, the research agent and the MCP
 * surface. Each class sets `name` so callers (and logs) can tell them apart
 * without `instanceof` across module boundaries.
 */

/** Invalid chunking / retrieval parameters or mismatched vector dimensions. Never retried. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/** Declared document type is not one the loader can read. */
export class UnsupportedFormatError extends Error {
  public readonly format: string;

  constructor(format: string, options?: ErrorOptions) {
    super(`Unsupported file type: ${format || "(none)"}`, options);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}

/** The parser for a supported format could not read the file (corrupt, encrypted, legacy binary). */
export class DocumentParseError extends Error {
  public readonly source: string;

  constructor(source: string, format: string, options?: ErrorOptions) {
    super(`Could not read '${source}' as ${format}.`, options);
    this.name = "DocumentParseError";
    this.source = source;
  }
}

/** Loaded document produced no text to index. */
export class EmptyDocumentError extends Error {
  constructor(source: string) {
    super(`Document '${source}' contains no extractable text.`);
    this.name = "EmptyDocumentError";
  }
}

/** Embedding model call failed (transport, model load, bad output). */
export class EmbeddingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EmbeddingError";
  }
}

/** Thrown when attempting to embed before initialization. */
export class EmbedderNotInitializedError extends EmbeddingError {
  constructor() {
    super("Embedder not initialized. Call init() first.");
    this.name = "EmbedderNotInitializedError";
  }
}

/** Generation model call failed (transport, auth, rate limit). */
export class GatewayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GatewayError";
  }
}

/** Operation invoked before its prerequisite state, e.g. asking before a document is indexed. */
export class NotReadyError extends Error {
  constructor(message = "No document has been processed. Please upload a document first.") {
    super(message);
    this.name = "NotReadyError";
  }
}

/** Reasoning loop could not reach the generation model. Reported, never raised to the host. */
export class AgentError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AgentError";
  }
}

/** Best-effort message extraction for logging and error strings. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
