/**
 * Centralized LLM Model Registry
 *
 * Single source of truth for the models the assistant talks to and the
 * provider each one is served by.
 *
 * PROVIDERS:
 *
 * openai - any OpenAI-compatible chat endpoint. This covers the hosted API
 *   and a local Ollama server exposing /v1 (the default deployment), which
 *   is why unknown model names fall through to this provider.
 *
 * gemini - Google models via @google/genai.
 *
 * claude - Anthropic models via @anthropic-ai/sdk.
 */

export const LLM_MODELS = {
  /**
   * Default local model served by Ollama. Used for intent classification,
   * slot extraction and answer composition unless LLM_MODEL overrides it.
   */
  LOCAL_DEFAULT: "llama3",
} as const;

export const GEMINI_MODELS = {
  FLASH: "gemini-2.5-flash",
} as const;

export const CLAUDE_MODELS = {
  SONNET: "claude-sonnet-4-5",
} as const;

export const EMBEDDING_MODELS = {
  /**
   * 1536 dimensions; must match EMBEDDING_DIMENSIONS in shared/schema.ts.
   */
  DEFAULT: "text-embedding-3-small",
} as const;

export type LLMProvider = "openai" | "gemini" | "claude";

const GEMINI_MODEL_SET = new Set<string>(Object.values(GEMINI_MODELS));
const CLAUDE_MODEL_SET = new Set<string>(Object.values(CLAUDE_MODELS));

export function detectProvider(model: string): LLMProvider {
  if (GEMINI_MODEL_SET.has(model) || model.startsWith("gemini-")) return "gemini";
  if (CLAUDE_MODEL_SET.has(model) || model.startsWith("claude-")) return "claude";
  return "openai";
}

/**
 * Specific model settings by task type.
 * Classification and extraction run deterministic; composition gets a little room.
 */
export const TASK_TEMPERATURES = {
  INTENT_CLASSIFICATION: 0,
  SLOT_EXTRACTION: 0,
  RAG_COMPOSITION: 0.2,
} as const;
