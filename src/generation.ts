/**
 * Generation gateway: prompt (+ conversation history) → model text, backed by
 * the `ai` SDK. Provider selection mirrors the usual anthropic / openai /
 * local (OpenAI-compatible server) split.
 */
import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type CoreMessage, type EmbeddingModel, type LanguageModelV1 } from "ai";
import { ConfigError, GatewayError, errorMessage } from "./errors";
import type { ConversationTurn } from "./memory";

export interface GenerateOptions {
  /** System prompt sent ahead of the history. */
  system?: string;
}

export interface GenerationGateway {
  /** Identifier of the underlying model (used for status / logs). */
  readonly modelId: string;
  /**
   * @throws {GatewayError} On transport, auth or rate-limit failure.
   */
  generate(
    prompt: string,
    history?: readonly ConversationTurn[],
    options?: GenerateOptions,
  ): Promise<string>;
}

export type LlmProvider = "anthropic" | "openai" | "local";

/** Sampling settings applied to every call. */
export interface SamplingSettings {
  maxTokens: number;
  temperature: number;
  topP: number;
  maxRetries: number;
}

export interface LlmSettings extends SamplingSettings {
  provider: LlmProvider;
  modelId: string;
  apiKey: string | undefined;
  baseURL: string | undefined;
}

/** Convert memory turns to chat messages, oldest first. */
export function toCoreMessages(history: readonly ConversationTurn[]): CoreMessage[] {
  return history.map((t): CoreMessage =>
    t.speaker === "user"
      ? { role: "user", content: t.utterance }
      : { role: "assistant", content: t.utterance },
  );
}

export class AiSdkGeneration implements GenerationGateway {
  public readonly modelId: string;

  public constructor(
    private readonly model: LanguageModelV1,
    private readonly sampling: SamplingSettings,
  ) {
    this.modelId = model.modelId;
  }

  public async generate(
    prompt: string,
    history: readonly ConversationTurn[] = [],
    options: GenerateOptions = {},
  ): Promise<string> {
    const messages: CoreMessage[] = [...toCoreMessages(history), { role: "user", content: prompt }];
    try {
      const result = await generateText({
        model: this.model,
        system: options.system,
        messages,
        maxTokens: this.sampling.maxTokens,
        temperature: this.sampling.temperature,
        topP: this.sampling.topP,
        maxRetries: this.sampling.maxRetries,
      });
      return result.text;
    } catch (e) {
      throw new GatewayError(`Generation request to ${this.modelId} failed: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }
}

/**
 * Build the language model for the configured provider.
 *
 * @throws {ConfigError} When a hosted provider has no API key, or `local` has no base URL.
 */
export function createLanguageModel(settings: LlmSettings): LanguageModelV1 {
  const { provider, modelId, apiKey, baseURL } = settings;
  switch (provider) {
    case "local": {
      if (!baseURL) throw new ConfigError("LLM_BASE_URL is required for the local provider");
      // OpenAI-compatible API (LM Studio, Ollama, vLLM, ...)
      const local = createOpenAI({ baseURL, apiKey: apiKey || "not-needed", compatibility: "compatible" });
      return local.chat(modelId);
    }
    case "openai": {
      if (!apiKey) throw new ConfigError("API key not configured for OpenAI");
      const openai = createOpenAI(baseURL ? { apiKey, baseURL, compatibility: "compatible" } : { apiKey });
      return baseURL ? openai.chat(modelId) : openai(modelId);
    }
    case "anthropic": {
      if (!apiKey) throw new ConfigError("API key not configured for Anthropic");
      const anthropic = createAnthropic(baseURL ? { apiKey, baseURL } : { apiKey });
      return anthropic(modelId);
    }
  }
}

/**
 * Hosted embedding model for EMBEDDING_PROVIDER=openai. Reuses the LLM key
 * and base URL when the LLM provider is OpenAI-compatible.
 *
 * @throws {ConfigError} When no OpenAI key is available.
 */
export function createEmbeddingModel(
  modelId: string,
  apiKey: string | undefined,
  baseURL: string | undefined,
): EmbeddingModel<string> {
  if (!apiKey) throw new ConfigError("OPENAI_API_KEY is required for EMBEDDING_PROVIDER=openai");
  const openai = createOpenAI(baseURL ? { apiKey, baseURL } : { apiKey });
  return openai.embedding(modelId);
}
