import { describe, expect, it } from "vitest";
import { runReasoningLoop, type LoopState } from "../../src/agent/loop";
import { AGENT_SYSTEM_PROMPT } from "../../src/agent/prompts";
import { AgentError, GatewayError } from "../../src/errors";
import { createDefaultToolRegistry } from "../../src/tools/registry";
import { ScriptedGeneration, finalAnswer, toolCall } from "../helpers/fakes";

const tools = createDefaultToolRegistry(() => new Date(2024, 0, 1));

describe("runReasoningLoop", () => {
  it("finishes immediately on a final answer", async () => {
    const generation = new ScriptedGeneration([finalAnswer("Hello!")]);
    const states: LoopState[] = [];
    const outcome = await runReasoningLoop("Say hi", generation, tools, { onStateChange: (s) => states.push(s) });

    expect(outcome).toEqual({
      answer: "Hello!",
      trace: [{ sequence: 1, action: { type: "finish", answer: "Hello!" } }],
      toolsInvoked: [],
      stoppedEarly: false,
    });
    expect(states).toEqual(["thinking", "finished"]);
  });

  it("runs a tool and feeds the observation back", async () => {
    const generation = new ScriptedGeneration([toolCall("calculator", "6*7"), finalAnswer("42")]);
    const states: LoopState[] = [];
    const outcome = await runReasoningLoop("What is 6 times 7?", generation, tools, {
      onStateChange: (s) => states.push(s),
    });

    expect(outcome.answer).toBe("42");
    expect(outcome.toolsInvoked).toEqual(["calculator"]);
    expect(outcome.trace[0]).toEqual({
      sequence: 1,
      action: { type: "tool", tool: "calculator", input: "6*7" },
      observation: "The result of 6*7 is: 42",
    });
    expect(generation.calls[1].prompt).toContain("Observation: The result of 6*7 is: 42");
    expect(states).toEqual(["thinking", "acting", "observing", "thinking", "finished"]);
  });

  it("lists the valid tools when the model asks for an unknown one", async () => {
    const generation = new ScriptedGeneration([toolCall("web_search", "weather"), finalAnswer("Unknown.")]);
    const outcome = await runReasoningLoop("Weather?", generation, tools);

    expect(outcome.trace[0].observation).toBe(
      "Unknown tool 'web_search'. Valid tools are: calculator, text_analyzer, datetime_tool",
    );
    expect(outcome.toolsInvoked).toEqual([]);
  });

  it("makes one finalization call after the iteration cap", async () => {
    const generation = new ScriptedGeneration([
      toolCall("calculator", "1+1"),
      toolCall("calculator", "2+2"),
      finalAnswer("Both done."),
    ]);
    const outcome = await runReasoningLoop("Add things", generation, tools, { maxIterations: 2 });

    expect(generation.calls).toHaveLength(3);
    expect(generation.calls[2].prompt).toContain("You have run out of steps");
    expect(outcome.stoppedEarly).toBe(true);
    expect(outcome.answer).toBe("Both done.");
    expect(outcome.trace.map((s) => s.action.type)).toEqual(["tool", "tool", "finish"]);
    expect(outcome.toolsInvoked).toEqual(["calculator"]);
  });

  it("uses an untagged finalization reply as the answer", async () => {
    const generation = new ScriptedGeneration([toolCall("calculator", "1+1"), "  It is 2.  "]);
    const outcome = await runReasoningLoop("1+1?", generation, tools, { maxIterations: 1 });
    expect(outcome.answer).toBe("It is 2.");
  });

  it("passes history and the system prompt on every call", async () => {
    const history = [
      { speaker: "user" as const, utterance: "Earlier question" },
      { speaker: "assistant" as const, utterance: "Earlier answer" },
    ];
    const generation = new ScriptedGeneration([toolCall("datetime_tool", "current"), finalAnswer("It is 2024.")]);
    await runReasoningLoop("What year is it?", generation, tools, { history });

    for (const call of generation.calls) {
      expect(call.history).toEqual(history);
      expect(call.options).toEqual({ system: AGENT_SYSTEM_PROMPT });
    }
  });

  it("wraps generation failures in AgentError", async () => {
    const cause = new GatewayError("rate limited");
    const generation = new ScriptedGeneration([cause]);
    const err = await runReasoningLoop("Anything", generation, tools).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AgentError);
    expect(err).toMatchObject({ message: "rate limited", cause });
  });

  it("rejects a non-positive iteration cap", async () => {
    await expect(runReasoningLoop("x", new ScriptedGeneration(), tools, { maxIterations: 0 })).rejects.toBeInstanceOf(
      AgentError,
    );
  });
});
