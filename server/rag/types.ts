/**
 * RAG Type Definitions
 *
 * Layer: RAG (type definitions)
 */

export type RetrievedDocument = {
  /** Stored document id: the note's path relative to the notes root */
  id: string;
  text: string;
  /** Cosine similarity, higher is closer */
  score: number;
};

export interface Retriever {
  retrieve(question: string, k: number): Promise<RetrievedDocument[]>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export type RagAnswer = {
  reply: string;
  retrievedIds: string[];
};

export interface RagAnswerer {
  answer(question: string): Promise<RagAnswer>;
}
