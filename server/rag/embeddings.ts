/**
 * Embeddings over the OpenAI embeddings endpoint. Without an OpenAI key the
 * request goes to the configured OpenAI-compatible base URL instead, which
 * lets a local Ollama serve embeddings too.
 */

import { OpenAI } from "openai";
import { ExternalServiceError, TimeoutError } from "../utils/errorHandler";
import { withTimeout } from "../utils/timeout";
import type { Embedder } from "./types";

// Long notes are embedded from their head
const MAX_EMBED_CHARS = 8000;

export type EmbedderOptions = {
  model: string;
  timeoutMs: number;
  apiKey?: string;
  baseUrl: string;
};

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;

  constructor(private readonly options: EmbedderOptions, client?: OpenAI) {
    this.client = client ?? new OpenAI({
      apiKey: options.apiKey ?? "ollama",
      baseURL: options.apiKey ? undefined : options.baseUrl,
      maxRetries: 0,
    });
  }

  async embed(text: string): Promise<number[]> {
    try {
      const response = await withTimeout(
        this.client.embeddings.create({
          model: this.options.model,
          input: text.slice(0, MAX_EMBED_CHARS),
        }),
        this.options.timeoutMs,
        "Embedding request",
      );
      const first = response.data[0];
      if (!first) {
        throw new ExternalServiceError("Embeddings", "empty embedding response");
      }
      return first.embedding;
    } catch (err) {
      if (err instanceof ExternalServiceError || err instanceof TimeoutError) throw err;
      throw new ExternalServiceError("Embeddings", err instanceof Error ? err.message : String(err), { cause: err });
    }
  }
}
