/*This file:
knows about Postgres
knows about pgvector
knows about the note_chunks table*/

import { z } from 'zod'
import type { IStorage } from '../storage'
import type { Embedder, RetrievedDocument, Retriever } from './types'

const similarityRowSchema = z.object({
  doc_id: z.string(),
  text: z.string(),
  score: z.coerce.number(),
})

/**
 * Nearest notes by cosine distance (pgvector `<=>`).
 */
export class PgVectorRetriever implements Retriever {
  constructor(
    private readonly storage: IStorage,
    private readonly embedder: Embedder,
  ) {}

  async retrieve(question: string, k: number): Promise<RetrievedDocument[]> {
    const embedding = await this.embedder.embed(question)
    const rows = await this.storage.rawQuery(
      `SELECT doc_id, text, 1 - (embedding <=> $1::vector) AS score
       FROM note_chunks
       ORDER BY embedding <=> $1::vector
       LIMIT $2`,
      [JSON.stringify(embedding), k]
    )

    return rows.map((row) => {
      const parsed = similarityRowSchema.parse(row)
      return { id: parsed.doc_id, text: parsed.text, score: parsed.score }
    })
  }
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0
  let normA = 0
  let normB = 0
  const length = Math.min(a.length, b.length)
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/**
 * Same ranking computed in process over every stored chunk.
 * Used when no database is configured.
 */
export class InMemoryRetriever implements Retriever {
  constructor(
    private readonly storage: IStorage,
    private readonly embedder: Embedder,
  ) {}

  async retrieve(question: string, k: number): Promise<RetrievedDocument[]> {
    const embedding = await this.embedder.embed(question)
    const chunks = await this.storage.listNoteChunks()

    return chunks
      .map((chunk) => ({
        id: chunk.docId,
        text: chunk.text,
        score: cosineSimilarity(embedding, chunk.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k)
  }
}
