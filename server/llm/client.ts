import { OpenAI } from "openai";
import { GoogleGenAI } from "@google/genai";
import Anthropic from "@anthropic-ai/sdk";
import { detectProvider, type LLMProvider } from "../config/models";
import type { LLMConfig } from "../config/env";
import { ExternalServiceError, TimeoutError, getErrorMessage } from "../utils/errorHandler";
import { withTimeout } from "../utils/timeout";

export type LLMMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

export type LLMRequestOptions = {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
};

export type LLMResponse = {
  text: string;
  provider: LLMProvider;
  model: string;
};

/**
 * The chat-completion collaborator: ordered messages in, one text reply out.
 * Any failure to obtain a reply rejects; an empty reply is still a reply.
 */
export interface ChatModel {
  complete(messages: LLMMessage[], options?: { temperature?: number }): Promise<string>;
}

type ProviderClients = {
  openai?: OpenAI;
  gemini?: GoogleGenAI;
  claude?: Anthropic;
};

export function createChatModel(config: LLMConfig): ChatModel {
  const provider = detectProvider(config.model);
  const clients: ProviderClients = {};

  function getOpenAI(): OpenAI {
    if (!clients.openai) {
      // Local OpenAI-compatible servers (Ollama) accept any key.
      clients.openai = new OpenAI({
        apiKey: config.openaiApiKey ?? "ollama",
        baseURL: config.baseUrl,
        maxRetries: 0,
      });
    }
    return clients.openai;
  }

  function getGemini(): GoogleGenAI {
    if (!clients.gemini) {
      if (!config.geminiApiKey) throw new Error("[LLM Client] GEMINI_API_KEY is not set");
      clients.gemini = new GoogleGenAI({ apiKey: config.geminiApiKey });
    }
    return clients.gemini;
  }

  function getClaude(): Anthropic {
    if (!clients.claude) {
      if (!config.anthropicApiKey) throw new Error("[LLM Client] ANTHROPIC_API_KEY is not set");
      clients.claude = new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 0 });
    }
    return clients.claude;
  }

  async function generateText(opts: LLMRequestOptions): Promise<LLMResponse> {
    switch (provider) {
      case "openai":
        return callOpenAI(getOpenAI(), opts);
      case "gemini":
        return callGemini(getGemini(), opts);
      case "claude":
        return callClaude(getClaude(), opts);
      default: {
        const _exhaustive: never = provider;
        throw new Error(`[LLM Client] Unhandled provider: ${_exhaustive}`);
      }
    }
  }

  return {
    async complete(messages, options) {
      try {
        const response = await withTimeout(
          generateText({ model: config.model, messages, temperature: options?.temperature }),
          config.timeoutMs,
          `LLM completion (${config.model})`,
        );
        return response.text;
      } catch (err) {
        if (err instanceof ExternalServiceError || err instanceof TimeoutError) throw err;
        throw new ExternalServiceError("LLM", getErrorMessage(err), { cause: err });
      }
    },
  };
}

async function callOpenAI(client: OpenAI, opts: LLMRequestOptions): Promise<LLMResponse> {
  const response = await client.chat.completions.create({
    model: opts.model,
    messages: opts.messages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
    ...(opts.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
  });

  return {
    text: response.choices[0]?.message?.content || "",
    provider: "openai",
    model: opts.model,
  };
}

async function callGemini(client: GoogleGenAI, opts: LLMRequestOptions): Promise<LLMResponse> {
  const systemParts = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content);

  const nonSystemMessages = opts.messages.filter(m => m.role !== "system");

  const contents = nonSystemMessages.map(m => ({
    role: m.role === "assistant" ? "model" as const : "user" as const,
    parts: [{ text: m.content }],
  }));

  const systemInstruction = systemParts.length > 0
    ? systemParts.join("\n\n")
    : undefined;

  const response = await client.models.generateContent({
    model: opts.model,
    config: {
      ...(systemInstruction && { systemInstruction }),
      ...(opts.temperature !== undefined && { temperature: opts.temperature }),
      ...(opts.maxTokens !== undefined && { maxOutputTokens: opts.maxTokens }),
    },
    contents,
  });

  return {
    text: response.text || "",
    provider: "gemini",
    model: opts.model,
  };
}

async function callClaude(client: Anthropic, opts: LLMRequestOptions): Promise<LLMResponse> {
  const systemContent = opts.messages
    .filter(m => m.role === "system")
    .map(m => m.content)
    .join("\n\n");

  const nonSystemMessages = opts.messages.flatMap(m =>
    m.role === "system" ? [] : [{ role: m.role, content: m.content }],
  );

  const response = await client.messages.create({
    model: opts.model,
    max_tokens: opts.maxTokens || 1024,
    ...(systemContent && { system: systemContent }),
    messages: nonSystemMessages,
    ...(opts.temperature !== undefined && { temperature: opts.temperature }),
  });

  const textBlock = response.content.find(b => b.type === "text");

  return {
    text: textBlock?.type === "text" ? textBlock.text : "",
    provider: "claude",
    model: opts.model,
  };
}
