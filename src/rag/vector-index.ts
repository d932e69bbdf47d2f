import { cosine } from "../embeddings";
import { ConfigError } from "../errors";
import type { Embedding, IndexEntry, RetrievalResult } from "../types";

/** Similarity between a query vector and a stored vector; higher is closer. */
export type SimilarityFn = (a: Embedding, b: Embedding) => number;

/**
 * In-memory vector store: a linear cosine scan over every entry. One instance
 * belongs to one session; it is never shared.
 */
export class VectorIndex {
  private readonly entries: IndexEntry[] = [];
  private readonly similarity: SimilarityFn;
  private dimension: number | null = null;

  public constructor(similarity: SimilarityFn = cosine) {
    this.similarity = similarity;
  }

  /** Number of stored entries. */
  public get size(): number {
    return this.entries.length;
  }

  /**
   * Append entries (additive). All vectors must share one dimension.
   *
   * @throws {ConfigError} If any vector's length differs from the stored ones.
   *   Nothing from the batch is added in that case.
   */
  public add(entries: readonly IndexEntry[]): void {
    let dim = this.dimension;
    for (const e of entries) {
      if (dim === null) dim = e.embedding.length;
      else if (e.embedding.length !== dim) {
        throw new ConfigError(
          `Embedding dimension mismatch: index holds ${dim}-d vectors, got ${e.embedding.length}-d (chunk ${e.chunk.index}).`,
        );
      }
    }
    this.dimension = dim;
    this.entries.push(...entries);
  }

  /**
   * Top-k entries by similarity, descending. `k` is clamped to the index
   * size; an empty index yields an empty result. Equal scores keep insertion
   * order (Array.prototype.sort is stable).
   *
   * @throws {ConfigError} If k < 1 or the query dimension does not match.
   */
  public search(queryVector: Embedding, k: number): RetrievalResult {
    if (!Number.isInteger(k) || k < 1) {
      throw new ConfigError(`k must be a positive integer (got ${k}).`);
    }
    if (this.entries.length === 0) return [];
    if (this.dimension !== null && queryVector.length !== this.dimension) {
      throw new ConfigError(
        `Query embedding has ${queryVector.length} dimensions, index holds ${this.dimension}.`,
      );
    }
    const scored = this.entries.map((e) => ({
      chunk: e.chunk,
      score: this.similarity(queryVector, e.embedding),
    }));
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, Math.min(k, scored.length));
  }

  /** Discard every entry at once. */
  public clear(): void {
    this.entries.length = 0;
    this.dimension = null;
  }
}
