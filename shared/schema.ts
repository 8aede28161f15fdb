import { pgTable, serial, text, varchar, timestamp, vector, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const TODO_STATUSES = ["open", "done"] as const;
export type TodoStatus = typeof TODO_STATUSES[number];

export const EMBEDDING_DIMENSIONS = 1536;

export const todos = pgTable("todos", {
  id: serial("id").primaryKey(),
  text: text("text").notNull(),
  dueAt: timestamp("due_at"),
  status: text("status").default("open").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// One row per processed turn. Rows are only ever appended.
export const turnRecords = pgTable("turn_records", {
  id: serial("id").primaryKey(),
  userMessage: text("user_message").notNull(),
  assistantReply: text("assistant_reply").notNull(),
  toolsUsed: text("tools_used"), // comma-joined, null when no tool fired
  retrievedDocIds: text("retrieved_doc_ids"), // comma-joined, null when nothing was retrieved
  intent: varchar("intent").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const noteChunks = pgTable(
  "note_chunks",
  {
    id: serial("id").primaryKey(),
    docId: text("doc_id").notNull().unique(),
    text: text("text").notNull(),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    embeddingIdx: index("note_chunks_embedding_idx").using("hnsw", table.embedding.op("vector_cosine_ops")),
  }),
);

export const insertTodoSchema = createInsertSchema(todos).omit({
  id: true,
  createdAt: true,
}).extend({
  text: z.string().trim().min(1, "Todo text is required"),
  status: z.enum(TODO_STATUSES).default("open"),
});

export const insertTurnRecordSchema = createInsertSchema(turnRecords).omit({
  id: true,
  createdAt: true,
});

// drizzle-zod does not map vector columns, so this one is written out
export const insertNoteChunkSchema = z.object({
  docId: z.string().min(1),
  text: z.string(),
  embedding: z.array(z.number()).length(EMBEDDING_DIMENSIONS),
});

export type InsertTodo = z.infer<typeof insertTodoSchema>;
export type Todo = typeof todos.$inferSelect;

export type InsertTurnRecord = z.infer<typeof insertTurnRecordSchema>;
export type TurnRecordRow = typeof turnRecords.$inferSelect;

export type InsertNoteChunk = z.infer<typeof insertNoteChunkSchema>;
export type NoteChunk = typeof noteChunks.$inferSelect;
