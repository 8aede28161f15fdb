/**
 * RAG Main Entry Point
 *
 * Layer: RAG (entry point)
 */

import type { ChatModel } from "../llm/client";
import type { IStorage } from "../storage";
import { DbStorage } from "../storage";
import { createRagAnswerer } from "./composer";
import { InMemoryRetriever, PgVectorRetriever } from "./retriever";
import type { Embedder, RagAnswerer, Retriever } from "./types";

export type { Embedder, RagAnswer, RagAnswerer, RetrievedDocument, Retriever } from "./types";
export { OpenAIEmbedder } from "./embeddings";
export { createRagAnswerer } from "./composer";

export function createRetriever(storage: IStorage, embedder: Embedder): Retriever {
  return storage instanceof DbStorage
    ? new PgVectorRetriever(storage, embedder)
    : new InMemoryRetriever(storage, embedder);
}

export function buildRagAnswerer(params: {
  storage: IStorage;
  embedder: Embedder;
  chat: ChatModel;
  topK: number;
  timeoutMs: number;
}): RagAnswerer {
  const retriever = createRetriever(params.storage, params.embedder);
  return createRagAnswerer(retriever, params.chat, { topK: params.topK, timeoutMs: params.timeoutMs });
}
