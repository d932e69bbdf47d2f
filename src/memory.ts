/** Who produced an utterance. */
export type Speaker = "user" | "assistant";

export interface ConversationTurn {
  readonly speaker: Speaker;
  readonly utterance: string;
}

/**
 * Append-only conversation log scoped to one session (a document chat or a
 * research agent). Turns are never edited; the whole log can be cleared.
 * Each session constructs its own instance, so nothing is shared between
 * sessions.
 */
export class ConversationMemory {
  private readonly log: ConversationTurn[] = [];

  /** Append one turn. */
  public append(speaker: Speaker, utterance: string): void {
    this.log.push({ speaker, utterance });
  }

  /** Append a question / answer pair (user first). */
  public appendExchange(question: string, answer: string): void {
    this.append("user", question);
    this.append("assistant", answer);
  }

  /** Snapshot of the turns in order. Later appends do not affect a returned snapshot. */
  public turns(): readonly ConversationTurn[] {
    return this.log.slice();
  }

  public get size(): number {
    return this.log.length;
  }

  /** Drop every turn. */
  public clear(): void {
    this.log.length = 0;
  }
}
