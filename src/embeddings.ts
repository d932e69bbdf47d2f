import type { FeatureExtractionPipeline } from "@huggingface/transformers";
import { embed, type EmbeddingModel } from "ai";
import { ConfigError, EmbedderNotInitializedError, EmbeddingError, errorMessage } from "./errors";
import type { Embedding } from "./types";

/**
 * Text → fixed-dimension vector. Every vector produced by one gateway has the
 * same length. Failures surface as {@link EmbeddingError}.
 */
export interface EmbeddingGateway {
  /** Identifier of the underlying model (used for status / logs). */
  getModelName(): string;
  /** Prepare the model. Idempotent; a no-op for hosted models. */
  init(): Promise<void>;
  embed(text: string): Promise<Embedding>;
}

export const DEFAULT_LOCAL_EMBEDDING_MODEL = "Xenova/all-MiniLM-L6-v2";

/**
 * Local feature-extraction pipeline (mean pooling + L2 normalization).
 * A single instance can be reused for any number of embed() calls.
 */
export class Embeddings implements EmbeddingGateway {
  private readonly modelName: string;
  private embedder: FeatureExtractionPipeline | null = null;

  public constructor(modelName?: string) {
    // Resolution precedence: explicit ctor arg > EMBEDDING_MODEL env var > default model
    this.modelName =
      modelName?.trim() || process.env.EMBEDDING_MODEL?.trim() || DEFAULT_LOCAL_EMBEDDING_MODEL;
  }

  public getModelName(): string {
    return this.modelName;
  }

  /** Lazily initialize the underlying embedding pipeline (idempotent). */
  public async init(): Promise<void> {
    if (this.embedder) return;
    console.error(`[Embeddings] Loading embedding model: ${this.modelName}`);
    try {
      const { pipeline } = await import("@huggingface/transformers");
      this.embedder = await pipeline("feature-extraction", this.modelName);
    } catch (e) {
      throw new EmbeddingError(`Failed to load embedding model ${this.modelName}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    console.error(`[Embeddings] Model ready: ${this.modelName}`);
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   * @throws {EmbeddingError} If the pipeline fails or returns a non-float tensor.
   */
  public async embed(text: string): Promise<Embedding> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    let data: unknown;
    try {
      const output = await this.embedder(text, { pooling: "mean", normalize: true });
      data = output.data;
    } catch (e) {
      throw new EmbeddingError(`Embedding failed: ${errorMessage(e)}`, { cause: e });
    }
    if (!(data instanceof Float32Array)) {
      throw new EmbeddingError("Embedding model returned a non-float32 tensor.");
    }
    return data;
  }
}

/**
 * Hosted embedding model reached through the `ai` SDK (e.g. an OpenAI
 * embedding model). Vectors are converted to Float32Array so both gateways
 * feed the same index.
 */
export class HostedEmbeddings implements EmbeddingGateway {
  public constructor(
    private readonly model: EmbeddingModel<string>,
    private readonly maxRetries = 2,
  ) {}

  public getModelName(): string {
    return this.model.modelId;
  }

  public async init(): Promise<void> {
    /* hosted: nothing to load */
  }

  public async embed(text: string): Promise<Embedding> {
    try {
      const { embedding } = await embed({ model: this.model, value: text, maxRetries: this.maxRetries });
      return Float32Array.from(embedding);
    } catch (e) {
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}

/**
 * Cosine similarity between two vectors of equal length, in [-1, 1]. A zero
 * vector scores 0 against anything.
 *
 * @throws {ConfigError} On a dimension mismatch: vectors from different
 *   models cannot be compared.
 */
export function cosine(a: Embedding, b: Embedding): number {
  if (a.length !== b.length) {
    throw new ConfigError(`Embedding dimension mismatch: ${a.length} vs ${b.length}.`);
  }
  let dot = 0,
    na = 0,
    nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return dot / (Math.sqrt(na) * Math.sqrt(nb) + 1e-10);
}
