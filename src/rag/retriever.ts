import type { EmbeddingGateway } from "../embeddings";
import type { RetrievalResult } from "../types";
import type { VectorIndex } from "./vector-index";

export const DEFAULT_TOP_K = 4;

/**
 * Embeds a query and runs a nearest-neighbour search. Embedding failures
 * propagate as EmbeddingError; an empty result only ever means an empty index.
 */
export class Retriever {
  public constructor(
    private readonly embeddings: EmbeddingGateway,
    private readonly index: VectorIndex,
  ) {}

  public async retrieve(queryText: string, k = DEFAULT_TOP_K): Promise<RetrievalResult> {
    const qEmb = await this.embeddings.embed(queryText);
    return this.index.search(qEmb, k);
  }
}
