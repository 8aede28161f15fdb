/**
 * Notes ingestion pipeline.
 *
 * Responsibilities:
 * - Walk a notes directory for .md and .txt files
 * - Use each file's path relative to the notes root as its document id
 * - Embed and upsert every file as one note chunk
 *
 * Re-running is idempotent: a document id already stored is overwritten.
 *
 * Layer: Ingestion (write-only)
 */

import { readdir, readFile } from "fs/promises";
import * as path from "path";
import { RAG_CONSTANTS } from "../config/constants";
import type { Embedder } from "../rag/types";
import type { IStorage } from "../storage";

export type IngestNotesResult = {
  ingested: string[];
  skipped: string[];
};

function isNoteFile(name: string): boolean {
  const lower = name.toLowerCase();
  return RAG_CONSTANTS.NOTE_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Note paths under `root`, sorted, with forward slashes on every platform.
 */
export async function listNoteFiles(root: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(path.join(root, prefix), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...await listNoteFiles(root, relative));
    } else if (entry.isFile() && isNoteFile(entry.name)) {
      files.push(relative);
    }
  }
  return files.sort();
}

export async function ingestNotes(params: {
  notesDir: string;
  storage: IStorage;
  embedder: Embedder;
  dryRun?: boolean;
}): Promise<IngestNotesResult> {
  const root = path.resolve(params.notesDir);
  const result: IngestNotesResult = { ingested: [], skipped: [] };

  for (const docId of await listNoteFiles(root)) {
    const text = (await readFile(path.join(root, docId), "utf-8")).trim();
    if (!text) {
      console.log(`[Ingest] Skipping empty note ${docId}`);
      result.skipped.push(docId);
      continue;
    }

    if (!params.dryRun) {
      const embedding = await params.embedder.embed(text);
      await params.storage.upsertNoteChunk({ docId, text, embedding });
    }
    console.log(`[Ingest] Ingested ${docId}`);
    result.ingested.push(docId);
  }

  return result;
}
