import type { EmbeddingGateway } from "../embeddings";
import { EmptyDocumentError, NotReadyError, errorMessage } from "../errors";
import type { GenerationGateway } from "../generation";
import { ConversationMemory, type ConversationTurn } from "../memory";
import { SerialQueue } from "../serial";
import { statusManager } from "../status";
import type { ChunkMetadata, Document, DocumentFormat, DocumentMetadata, IndexEntry } from "../types";
import { splitDocument } from "./chunker";
import { SUPPORTED_FORMATS, formatOf, loadDocument, loadDocumentFile } from "./document-loader";
import { DEFAULT_TOP_K, Retriever } from "./retriever";
import { VectorIndex } from "./vector-index";

/** Lifecycle of a document chat session. Answering is transient inside {@link DocumentChatSession.ask}. */
export type DocumentChatState = "empty" | "indexed";

export interface DocumentChatOptions {
  embeddings: EmbeddingGateway;
  generation: GenerationGateway;
  chunkSize?: number; // default 1000
  chunkOverlap?: number; // default 200
  topK?: number; // default 4
  verbose?: boolean;
}

/** One retrieved chunk as shown to the caller. */
export interface SourcePreview {
  /** First 200 characters of the chunk, with "..." appended when truncated. */
  content: string;
  metadata: ChunkMetadata;
}

export interface Answer {
  answer: string;
  sources: SourcePreview[];
  question: string;
}

export const SOURCE_PREVIEW_LENGTH = 200;
export const SUMMARY_SAMPLE_SIZE = 3;
export const SUMMARY_QUERY = "summary overview content";
export const NO_DOCUMENT_SUMMARY = "No document uploaded.";
export const SUMMARY_FALLBACK = "Unable to generate summary at this time.";

/** Truncated chunk preview used in answers; counts code points so no character is split. */
export function previewOf(text: string): string {
  const chars = Array.from(text);
  return chars.length > SOURCE_PREVIEW_LENGTH ? `${chars.slice(0, SOURCE_PREVIEW_LENGTH).join("")}...` : text;
}

/** "Stuff" prompt: every retrieved chunk, then the question. */
export function buildQuestionPrompt(contextChunks: readonly string[], question: string): string {
  return `Use the following pieces of context to answer the question at the end. If you don't know the answer, just say that you don't know, don't try to make up an answer.

${contextChunks.join("\n\n")}

Question: ${question}
Helpful Answer:`;
}

export function buildSummaryPrompt(contextChunks: readonly string[]): string {
  return `Please provide a concise summary of the following document content:

${contextChunks.join("\n\n")}

Summary:`;
}

/**
 * Chat-with-a-document session: chunk → embed → index on ingest, then
 * retrieve → generate per question. Owns its vector index and conversation
 * memory; nothing is shared with other sessions. Ingest, ask, summarize and
 * clear run one at a time in call order.
 */
export class DocumentChatSession {
  private readonly embeddings: EmbeddingGateway;
  private readonly generation: GenerationGateway;
  private readonly index = new VectorIndex();
  private readonly retriever: Retriever;
  private readonly memory = new ConversationMemory();
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly topK: number;
  private readonly verbose: boolean;
  private state: DocumentChatState = "empty";
  private document: DocumentMetadata | null = null;
  private readonly queue = new SerialQueue();

  public constructor(opts: DocumentChatOptions) {
    this.embeddings = opts.embeddings;
    this.generation = opts.generation;
    this.chunkSize = opts.chunkSize ?? 1000;
    this.chunkOverlap = opts.chunkOverlap ?? 200;
    this.topK = opts.topK ?? DEFAULT_TOP_K;
    this.verbose = !!opts.verbose;
    this.retriever = new Retriever(this.embeddings, this.index);
  }

  public getState(): DocumentChatState {
    return this.state;
  }

  /** Metadata of the indexed document, or null when empty. */
  public getDocument(): DocumentMetadata | null {
    return this.document;
  }

  /** Conversation turns so far (snapshot). */
  public getHistory(): readonly ConversationTurn[] {
    return this.memory.turns();
  }

  public getSupportedFormats(): DocumentFormat[] {
    return [...SUPPORTED_FORMATS];
  }

  /**
   * Replace the session's document: clears the index and memory, chunks the
   * text, embeds every chunk, then indexes them all at once.
   *
   * On any failure the session is left empty (no partial index); callers
   * retry the whole ingestion.
   *
   * @returns Number of chunks indexed.
   * @throws {EmptyDocumentError} If the text yields no chunks.
   * @throws {EmbeddingError} If any chunk fails to embed.
   */
  public ingest(rawText: string, metadata: DocumentMetadata): Promise<number> {
    return this.queue.run(() => this.replaceDocument(rawText, metadata));
  }

  private async replaceDocument(rawText: string, metadata: DocumentMetadata): Promise<number> {
    this.reset();
    const doc: Document = { text: rawText, metadata };
    const chunks = splitDocument(doc, { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap });
    if (chunks.length === 0) throw new EmptyDocumentError(metadata.source);

    console.error(`[RAG] Ingesting ${metadata.source}: ${chunks.length} chunks. Generating embeddings...`);
    const entries: IndexEntry[] = [];
    for (const chunk of chunks) {
      if (this.verbose && chunk.index % 50 === 0) {
        console.error(`[RAG][verbose] Embedding ${chunk.index}/${chunks.length}`);
      }
      entries.push({ embedding: await this.embeddings.embed(chunk.text), chunk });
    }
    this.index.add(entries);
    this.document = metadata;
    this.state = "indexed";
    statusManager.recordIngest(chunks.length);
    console.error(`[RAG] ${metadata.source} ready (${chunks.length} chunks).`);
    return chunks.length;
  }

  /** Load raw bytes with the declared type taken from the file name, then ingest. */
  public async ingestBytes(bytes: Uint8Array, fileName: string, declaredType?: string): Promise<number> {
    const doc = await loadDocument(bytes, declaredType ?? formatOf(fileName), fileName);
    return this.ingest(doc.text, doc.metadata);
  }

  /** Read a file from disk (type from its extension), then ingest. */
  public async ingestFile(absPath: string): Promise<number> {
    const doc = await loadDocumentFile(absPath);
    return this.ingest(doc.text, doc.metadata);
  }

  /**
   * Answer a question from the indexed document, using the full conversation
   * so far as history. The exchange is recorded only when generation succeeds.
   *
   * @throws {NotReadyError} If no document is indexed.
   * @throws {EmbeddingError | GatewayError} On gateway failure.
   */
  public ask(question: string): Promise<Answer> {
    return this.queue.run(() => this.answer(question));
  }

  private async answer(question: string): Promise<Answer> {
    if (this.state !== "indexed") throw new NotReadyError();

    const matches = await this.retriever.retrieve(question, this.topK);
    const prompt = buildQuestionPrompt(
      matches.map((m) => m.chunk.text),
      question,
    );
    const answer = await this.generation.generate(prompt, this.memory.turns());
    this.memory.appendExchange(question, answer);
    statusManager.recordQuestion();

    return {
      answer,
      sources: matches.map((m) => ({ content: previewOf(m.chunk.text), metadata: m.chunk.metadata })),
      question,
    };
  }

  /**
   * Best-effort summary from a small sample of chunks. Never throws: failures
   * are logged and replaced by a fixed fallback string.
   */
  public summarize(): Promise<string> {
    return this.queue.run(() => this.summarizeIndexed());
  }

  private async summarizeIndexed(): Promise<string> {
    if (this.state !== "indexed") return NO_DOCUMENT_SUMMARY;
    try {
      const sample = await this.retriever.retrieve(SUMMARY_QUERY, SUMMARY_SAMPLE_SIZE);
      return await this.generation.generate(buildSummaryPrompt(sample.map((m) => m.chunk.text)));
    } catch (e) {
      console.error(`[RAG] Summary generation failed: ${errorMessage(e)}`);
      return SUMMARY_FALLBACK;
    }
  }

  /** Drop the document, its index and the conversation once earlier operations finish. */
  public clear(): Promise<void> {
    return this.queue.run(async () => this.reset());
  }

  private reset(): void {
    this.index.clear();
    this.memory.clear();
    this.document = null;
    this.state = "empty";
  }
}
