/**
 * RAG composition layer.
 *
 * Retrieves the closest notes for a question and asks the chat model to
 * answer with them as background.
 *
 * - Input = the raw question
 * - Output = the model's reply plus the ids of the notes it was given
 *
 * Layer: RAG – Composition
 */

import { RAG_ANSWER_PROMPT, buildRagUserMessage } from "../config/prompts";
import { TASK_TEMPERATURES } from "../config/models";
import type { ChatModel } from "../llm/client";
import { withTimeout } from "../utils/timeout";
import type { RagAnswerer, Retriever } from "./types";

export type RagAnswererOptions = {
  topK: number;
  timeoutMs: number;
};

export function createRagAnswerer(
  retriever: Retriever,
  chat: ChatModel,
  options: RagAnswererOptions,
): RagAnswerer {
  return {
    async answer(question) {
      const documents = await withTimeout(
        retriever.retrieve(question, options.topK),
        options.timeoutMs,
        "Note retrieval",
      );
      const context = documents.map(doc => doc.text).join("\n\n");

      const reply = await chat.complete(
        [
          { role: "system", content: RAG_ANSWER_PROMPT },
          { role: "user", content: buildRagUserMessage(context, question) },
        ],
        { temperature: TASK_TEMPERATURES.RAG_COMPOSITION },
      );

      return {
        reply,
        retrievedIds: Array.from(new Set(documents.map(doc => doc.id))),
      };
    },
  };
}
