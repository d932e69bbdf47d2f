import { describe, expect, it } from "vitest";
import { MockEmbeddingModelV1, MockLanguageModelV1 } from "ai/test";
import { HostedEmbeddings } from "../src/embeddings";
import { ConfigError, EmbeddingError, GatewayError } from "../src/errors";
import { AiSdkGeneration, createLanguageModel, toCoreMessages, type LlmSettings } from "../src/generation";

const SAMPLING = { maxTokens: 256, temperature: 0.2, topP: 0.5, maxRetries: 0 };

/** The parts of a provider call these tests look at. */
interface SeenCall {
  prompt: Array<{ role: string }>;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
}

function textModel(reply: string, seen: SeenCall[] = []) {
  return new MockLanguageModelV1({
    doGenerate: async (options) => {
      seen.push(options);
      return {
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: 5 },
        text: reply,
      };
    },
  });
}

describe("toCoreMessages", () => {
  it("maps speakers to chat roles in order", () => {
    expect(
      toCoreMessages([
        { speaker: "user", utterance: "Q" },
        { speaker: "assistant", utterance: "A" },
      ]),
    ).toEqual([
      { role: "user", content: "Q" },
      { role: "assistant", content: "A" },
    ]);
  });
});

describe("AiSdkGeneration", () => {
  it("sends system, history and prompt with the sampling settings", async () => {
    const seen: SeenCall[] = [];
    const generation = new AiSdkGeneration(textModel("An answer", seen), SAMPLING);

    const reply = await generation.generate(
      "New question",
      [
        { speaker: "user", utterance: "Old question" },
        { speaker: "assistant", utterance: "Old answer" },
      ],
      { system: "Be brief." },
    );

    expect(reply).toBe("An answer");
    expect(seen[0].prompt.map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
    expect(seen[0]).toMatchObject({ maxTokens: 256, temperature: 0.2, topP: 0.5 });
  });

  it("wraps provider failures in GatewayError", async () => {
    const model = new MockLanguageModelV1({
      doGenerate: async () => {
        throw new Error("upstream exploded");
      },
    });
    const err = await new AiSdkGeneration(model, SAMPLING).generate("Hi").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GatewayError);
    expect(err).toMatchObject({ message: expect.stringContaining("upstream exploded") });
  });

  it("reports the model id", () => {
    expect(new AiSdkGeneration(textModel("x"), SAMPLING).modelId).toBe("mock-model-id");
  });
});

describe("createLanguageModel", () => {
  const base: LlmSettings = { ...SAMPLING, provider: "anthropic", modelId: "claude-test", apiKey: undefined, baseURL: undefined };

  it("requires a key for hosted providers", () => {
    expect(() => createLanguageModel(base)).toThrow(ConfigError);
    expect(() => createLanguageModel({ ...base, provider: "openai" })).toThrow(ConfigError);
  });

  it("requires a base URL for a local server", () => {
    expect(() => createLanguageModel({ ...base, provider: "local" })).toThrow(ConfigError);
  });

  it("builds the requested model", () => {
    expect(createLanguageModel({ ...base, apiKey: "test-key" }).modelId).toBe("claude-test");
    expect(createLanguageModel({ ...base, provider: "openai", modelId: "gpt-test", apiKey: "test-key" }).modelId).toBe(
      "gpt-test",
    );
    expect(
      createLanguageModel({ ...base, provider: "local", modelId: "llama-test", baseURL: "http://localhost:1234/v1" })
        .modelId,
    ).toBe("llama-test");
  });
});

describe("HostedEmbeddings", () => {
  it("returns Float32Array vectors", async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async ({ values }) => ({ embeddings: values.map(() => [0.5, -0.25]) }),
    });
    const embeddings = new HostedEmbeddings(model, 0);
    const vector = await embeddings.embed("hello");
    expect(vector).toBeInstanceOf(Float32Array);
    expect(Array.from(vector)).toEqual([0.5, -0.25]);
    expect(embeddings.getModelName()).toBe("mock-model-id");
  });

  it("wraps failures in EmbeddingError", async () => {
    const model = new MockEmbeddingModelV1<string>({
      doEmbed: async () => {
        throw new Error("quota");
      },
    });
    await expect(new HostedEmbeddings(model, 0).embed("hello")).rejects.toBeInstanceOf(EmbeddingError);
  });
});
