import { APP_VERSION } from "./config";

/**
 * Aggregated activity counters across every session served by this process.
 * All values are monotonic, non‑negative integers updated in-place except
 * `activeSessions`, which goes down when a session closes.
 */
export interface ActivityStatus {
  /** Sessions (workspaces) currently open. */
  activeSessions: number;
  /** Documents successfully ingested. */
  documentsIngested: number;
  /** Chunks embedded and indexed across all ingests. */
  chunksIndexed: number;
  /** Document questions answered. */
  questionsAnswered: number;
  /** Research queries run, successful or not. */
  researchQueries: number;
  /** Research queries that ended with success=false. */
  researchFailures: number;
}

/**
 * Mutable in-memory snapshot of server lifecycle + activity.
 * Exposed read-only to external callers via `statusManager.getStatus()`.
 *
 * ready = true once the embedding and generation models are configured and
 * the transport is about to accept requests.
 */
export interface ServerStatus {
  /** Package / server version (kept in sync with package.json). */
  version: string;
  /** Directory documents are read from. */
  docsRoot: string;
  /** Embedding model identifier (may be empty pre-init). */
  embeddingModel: string;
  /** Generation model identifier (may be empty pre-init). */
  generationModel: string;
  /** Active transport in use: 'stdio' | 'http' | 'unknown'. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the process (or StatusManager) started. */
  startedAt: string;
  activity: ActivityStatus;
}

/**
 * Class wrapper around mutable server status state. Avoids ad-hoc mutation and
 * centralizes any future validation or side-effects.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docsRoot: initial?.docsRoot ?? "",
      embeddingModel: initial?.embeddingModel ?? "",
      generationModel: initial?.generationModel ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      activity: initial?.activity ?? {
        activeSessions: 0,
        documentsIngested: 0,
        chunksIndexed: 0,
        questionsAnswered: 0,
        researchQueries: 0,
        researchFailures: 0,
      },
    };
  }

  /** Record the concrete transport selected at runtime. */
  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setDocsRoot(root: string) {
    this.data.docsRoot = root;
  }

  /** Store the resolved model identifiers after gateway setup. */
  public setModels(embeddingModel: string, generationModel: string) {
    this.data.embeddingModel = embeddingModel;
    this.data.generationModel = generationModel;
  }

  public sessionOpened() {
    this.data.activity.activeSessions++;
  }

  public sessionClosed() {
    this.data.activity.activeSessions = Math.max(0, this.data.activity.activeSessions - 1);
  }

  public recordIngest(chunks: number) {
    this.data.activity.documentsIngested++;
    this.data.activity.chunksIndexed += chunks;
  }

  public recordQuestion() {
    this.data.activity.questionsAnswered++;
  }

  public recordResearch(success: boolean) {
    this.data.activity.researchQueries++;
    if (!success) this.data.activity.researchFailures++;
  }

  /** Transition ready=false -> true. */
  public markReady() {
    this.data.ready = true;
  }

  /** Access a live reference to current status (treat as read-only). */
  public getStatus(): ServerStatus {
    return this.data;
  }

  /** JSON serialization helper (returns underlying object). */
  public toJSON() {
    return this.data;
  }
}

// Singleton instance used across modules (sessions, transports, health checks).
export const statusManager = new StatusManager();
