import { AgentError, errorMessage } from "../errors";
import type { GenerationGateway } from "../generation";
import { ConversationMemory, type ConversationTurn } from "../memory";
import { SerialQueue } from "../serial";
import { statusManager } from "../status";
import { createDefaultToolRegistry, type ToolInfo, type ToolName, type ToolRegistry } from "../tools/registry";
import { DEFAULT_MAX_ITERATIONS, runReasoningLoop } from "./loop";
import type { AgentStep } from "./prompts";

export interface ResearchAgentOptions {
  generation: GenerationGateway;
  /** Defaults to the calculator, text analyzer and date/time tools. */
  tools?: ToolRegistry;
  maxIterations?: number; // default 3
  verbose?: boolean;
}

export interface ResearchOptions {
  /** Overrides the agent's iteration cap for this query only. */
  maxIterations?: number;
}

export interface ResearchResult {
  success: boolean;
  response: string;
  /** Names of every registered tool. */
  toolsUsed: ToolName[];
  /** Tools actually run while answering, in first-use order. */
  toolsInvoked: string[];
  error: string | null;
  trace: AgentStep[];
}

/**
 * Tool-using research assistant. Keeps its own conversation memory, fed to the
 * model as history on every query; a failed query leaves memory untouched.
 * Queries and memory resets run one at a time in call order.
 */
export class ResearchAgent {
  private readonly generation: GenerationGateway;
  private readonly tools: ToolRegistry;
  private readonly memory = new ConversationMemory();
  private readonly maxIterations: number;
  private readonly verbose: boolean;
  private readonly queue = new SerialQueue();

  public constructor(opts: ResearchAgentOptions) {
    this.generation = opts.generation;
    this.tools = opts.tools ?? createDefaultToolRegistry();
    this.maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.verbose = !!opts.verbose;
  }

  /** Run one query through the reasoning loop. Agent failures are reported in the result, not thrown. */
  public research(query: string, opts: ResearchOptions = {}): Promise<ResearchResult> {
    return this.queue.run(() => this.runQuery(query, opts));
  }

  private async runQuery(query: string, opts: ResearchOptions): Promise<ResearchResult> {
    const toolsUsed = this.tools.names();
    try {
      const outcome = await runReasoningLoop(query, this.generation, this.tools, {
        maxIterations: opts.maxIterations ?? this.maxIterations,
        history: this.memory.turns(),
        verbose: this.verbose,
      });
      this.memory.appendExchange(query, outcome.answer);
      statusManager.recordResearch(true);
      return {
        success: true,
        response: outcome.answer,
        toolsUsed,
        toolsInvoked: outcome.toolsInvoked,
        error: null,
        trace: outcome.trace,
      };
    } catch (e) {
      if (!(e instanceof AgentError)) throw e;
      const message = errorMessage(e);
      console.error(`[Agent] Research failed: ${message}`);
      statusManager.recordResearch(false);
      return {
        success: false,
        response: `I encountered an error while researching: ${message}`,
        toolsUsed,
        toolsInvoked: [],
        error: message,
        trace: [],
      };
    }
  }

  public getAvailableTools(): ToolInfo[] {
    return this.tools.list();
  }

  public getHistory(): readonly ConversationTurn[] {
    return this.memory.turns();
  }

  public clearMemory(): Promise<void> {
    return this.queue.run(async () => this.memory.clear());
  }
}
