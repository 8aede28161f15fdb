/**
 * Embeds every note under a directory into the note store.
 * Run with: npx tsx scripts/ingest-notes.ts [notesDir] [--dry-run]
 */

import { loadConfig } from "../server/config/env";
import { ingestNotes } from "../server/ingestion/ingestNotes";
import { OpenAIEmbedder } from "../server/rag";
import { createStorage } from "../server/storage";
import { configureLogging } from "../server/utils/logger";

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes("--dry-run");
  const notesDir = args.find(arg => !arg.startsWith("--")) ?? "notes";

  const config = loadConfig();
  configureLogging(config.logging);
  if (!config.databaseUrl && !dryRun) {
    throw new Error("DATABASE_URL is not set; notes can only be ingested into Postgres");
  }

  console.log(`Ingesting notes from ${notesDir}${dryRun ? " (dry run)" : ""}...\n`);

  const result = await ingestNotes({
    notesDir,
    storage: createStorage(config.databaseUrl),
    embedder: new OpenAIEmbedder({
      model: config.rag.embeddingModel,
      timeoutMs: config.externalCallTimeoutMs,
      apiKey: config.llm.openaiApiKey,
      baseUrl: config.llm.baseUrl,
    }),
    dryRun,
  });

  console.log("\n=== Ingestion Complete ===");
  console.log(`Notes ingested: ${result.ingested.length}`);
  console.log(`Empty notes skipped: ${result.skipped.length}`);

  process.exit(0);
}

main().catch((err) => {
  console.error("Ingestion failed:", err);
  process.exit(1);
});
