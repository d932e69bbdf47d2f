import type { ToolInfo } from "../tools/registry";

/** What the model asked for on one reasoning step. */
export type AgentAction =
  | { type: "tool"; tool: string; input: string }
  | { type: "finish"; answer: string };

export interface AgentStep {
  /** 1-based position in the trace. */
  sequence: number;
  action: AgentAction;
  /** Tool output; absent on the finishing step. */
  observation?: string;
}

export const AGENT_SYSTEM_PROMPT = `You are a research assistant that answers questions using the tools available to you.
Think step by step. Use a tool whenever it gives a more reliable answer than reasoning alone, e.g. arithmetic, text statistics or dates.`;

function describeTools(tools: readonly ToolInfo[]): string {
  return tools.map((t) => `- ${t.name}: ${t.description}`).join("\n");
}

/** Render the steps so far as the model sees them. */
export function formatTrace(trace: readonly AgentStep[]): string {
  return trace
    .map((step) => {
      if (step.action.type === "finish") return `Step ${step.sequence}: final answer\n${step.action.answer}`;
      return `Step ${step.sequence}: called ${step.action.tool} with input: ${step.action.input}\nObservation: ${step.observation ?? ""}`;
    })
    .join("\n\n");
}

/** Prompt for one reasoning iteration. */
export function buildAgentPrompt(query: string, tools: readonly ToolInfo[], trace: readonly AgentStep[]): string {
  const steps = trace.length > 0 ? `\n<previous_steps>\n${formatTrace(trace)}\n</previous_steps>\n` : "";
  return `<question>
${query}
</question>

<available_tools>
${describeTools(tools)}
</available_tools>
${steps}
<instructions>
Decide on the next step.

To use a tool, reply with exactly one tool call in this format:
<tool_call>
<name>tool_name</name>
<input>the text input for the tool</input>
</tool_call>

When you can answer the question, reply with:
<final_answer>
Your complete answer
</final_answer>
</instructions>`;
}

/** Prompt used once the iteration cap is hit: answer from what has been gathered. */
export function buildFinalizationPrompt(query: string, trace: readonly AgentStep[]): string {
  return `<question>
${query}
</question>

<previous_steps>
${formatTrace(trace)}
</previous_steps>

You have run out of steps and can no longer use tools. Using the observations above, give your best final answer to the question inside <final_answer></final_answer> tags.`;
}

const FINAL_ANSWER_RE = /<final_answer>([\s\S]*?)<\/final_answer>/i;
const TOOL_CALL_RE = /<tool_call>([\s\S]*?)<\/tool_call>/i;
const NAME_RE = /<name>([\s\S]*?)<\/name>/i;
const INPUT_RE = /<input>([\s\S]*?)<\/input>/i;

/**
 * Read the model's decision. A final answer wins over a tool call; a reply
 * with neither (or a tool call without a name) is taken as the answer itself.
 */
export function parseAgentDecision(reply: string): AgentAction {
  const final = FINAL_ANSWER_RE.exec(reply);
  if (final) return { type: "finish", answer: final[1].trim() };

  const call = TOOL_CALL_RE.exec(reply);
  const name = call ? NAME_RE.exec(call[1]) : null;
  if (call && name && name[1].trim()) {
    const input = INPUT_RE.exec(call[1]);
    return { type: "tool", tool: name[1].trim(), input: input ? input[1].trim() : "" };
  }

  return { type: "finish", answer: reply.trim() };
}
