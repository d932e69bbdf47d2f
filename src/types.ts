/**
 * Shared document / chunk / retrieval types used across the RAG pipeline.
 */

/** Formats the document loader understands (declared by file extension). */
export type DocumentFormat = "pdf" | "docx" | "doc" | "txt";

/** Origin metadata attached to a document and inherited by its chunks. */
export interface DocumentMetadata {
  /** Original file name (e.g. "report.pdf"). */
  readonly source: string;
  /** Declared format the text was extracted from. */
  readonly fileType: DocumentFormat;
  /** Page count when the format has pages (PDF). */
  readonly pageCount?: number;
}

/** Raw text extracted from an uploaded file. Never mutated once created. */
export interface Document {
  readonly text: string;
  readonly metadata: DocumentMetadata;
}

/** Chunk metadata: the document's metadata plus the chunk position. */
export interface ChunkMetadata extends Partial<DocumentMetadata> {
  readonly chunkIndex: number;
}

/** Contiguous text window derived from one document. */
export interface Chunk {
  /** Chunk text content. */
  readonly text: string;
  /** 0-based position in the chunk sequence. */
  readonly index: number;
  /** UTF-16 offset of the window start within the source text (`text.slice(offset)` starts the window). */
  readonly offset: number;
  readonly metadata: ChunkMetadata;
}

/** Fixed-length vector produced by the embedding gateway. */
export type Embedding = Float32Array;

/** (vector, chunk) pair owned by the vector index once added. */
export interface IndexEntry {
  readonly embedding: Embedding;
  readonly chunk: Chunk;
}

/** One scored match; a retrieval result is an ordered list of these. */
export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

/** Descending-score matches, length ≤ k, ties in insertion order. */
export type RetrievalResult = ScoredChunk[];
