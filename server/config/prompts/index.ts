/**
 * Centralized Prompt Configuration
 *
 * All LLM prompts are maintained in this single location so wording
 * changes are reviewed in one place and tracked via git.
 *
 * Structure:
 * - assistant.ts: intent classification, slot extraction, RAG answers
 */

export * from "./assistant";
