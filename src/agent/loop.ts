import { AgentError, errorMessage } from "../errors";
import type { GenerationGateway } from "../generation";
import type { ConversationTurn } from "../memory";
import type { ToolRegistry } from "../tools/registry";
import {
  AGENT_SYSTEM_PROMPT,
  buildAgentPrompt,
  buildFinalizationPrompt,
  parseAgentDecision,
  type AgentAction,
  type AgentStep,
} from "./prompts";

export type LoopState = "thinking" | "acting" | "observing" | "finished";

export const DEFAULT_MAX_ITERATIONS = 3;

export interface LoopOptions {
  /** Model calls allowed before the early-stopping call. */
  maxIterations?: number;
  /** Earlier exchanges of the same agent, oldest first. */
  history?: readonly ConversationTurn[];
  verbose?: boolean;
  /** Observer for state transitions (tests, logging). */
  onStateChange?: (state: LoopState) => void;
}

export interface LoopOutcome {
  answer: string;
  trace: AgentStep[];
  /** Distinct registered tools actually run, in first-use order. */
  toolsInvoked: string[];
  /** True when the cap was hit and the answer came from the finalization call. */
  stoppedEarly: boolean;
}

/**
 * Bounded think → act → observe loop. Each iteration is one model call; a
 * tool call is executed and its output appended to the trace before the next
 * iteration. After `maxIterations` calls without a final answer, one more call
 * asks for a best-effort answer from the trace.
 *
 * @throws {AgentError} When the generation gateway fails.
 */
export async function runReasoningLoop(
  query: string,
  generation: GenerationGateway,
  tools: ToolRegistry,
  opts: LoopOptions = {},
): Promise<LoopOutcome> {
  const maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new AgentError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }
  const history = opts.history ?? [];
  const trace: AgentStep[] = [];
  const toolsInvoked: string[] = [];
  const setState = (state: LoopState) => opts.onStateChange?.(state);

  const ask = async (prompt: string): Promise<string> => {
    try {
      return await generation.generate(prompt, history, { system: AGENT_SYSTEM_PROMPT });
    } catch (e) {
      throw new AgentError(errorMessage(e), { cause: e });
    }
  };

  const finish = (answer: string, stoppedEarly: boolean): LoopOutcome => {
    trace.push({ sequence: trace.length + 1, action: { type: "finish", answer } });
    setState("finished");
    return { answer, trace, toolsInvoked, stoppedEarly };
  };

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    setState("thinking");
    const action: AgentAction = parseAgentDecision(await ask(buildAgentPrompt(query, tools.list(), trace)));
    if (action.type === "finish") return finish(action.answer, false);

    setState("acting");
    const tool = tools.get(action.tool);
    let observation: string;
    if (tool) {
      if (opts.verbose) console.error(`[Agent][verbose] ${tool.name} <- ${action.input}`);
      observation = await tool.run(action.input);
      if (!toolsInvoked.includes(tool.name)) toolsInvoked.push(tool.name);
    } else {
      observation = `Unknown tool '${action.tool}'. Valid tools are: ${tools.names().join(", ")}`;
    }

    setState("observing");
    trace.push({ sequence: trace.length + 1, action, observation });
  }

  console.error(`[Agent] Iteration limit (${maxIterations}) reached; asking for a final answer.`);
  setState("thinking");
  const reply = await ask(buildFinalizationPrompt(query, trace));
  const final = parseAgentDecision(reply);
  return finish(final.type === "finish" ? final.answer : reply.trim(), true);
}
