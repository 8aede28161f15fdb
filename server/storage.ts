import {
  type Todo,
  type InsertTodo,
  type TodoStatus,
  type TurnRecordRow,
  type InsertTurnRecord,
  type NoteChunk,
  type InsertNoteChunk,
  todos as todosTable,
  turnRecords as turnRecordsTable,
  noteChunks as noteChunksTable,
} from "@shared/schema";
import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { desc, eq } from "drizzle-orm";

export type RawRow = Record<string, unknown>;

export interface IStorage {
  // Todos
  createTodo(todo: InsertTodo): Promise<Todo>;
  listTodos(status?: TodoStatus): Promise<Todo[]>;

  // Turn records (append-only)
  insertTurnRecord(record: InsertTurnRecord): Promise<TurnRecordRow>;
  listTurnRecords(limit: number): Promise<TurnRecordRow[]>;

  // Note chunks
  upsertNoteChunk(chunk: InsertNoteChunk): Promise<NoteChunk>;
  listNoteChunks(): Promise<NoteChunk[]>;

  rawQuery(query: string, params?: unknown[]): Promise<RawRow[]>;
}

function newestFirst<T extends { id: number; createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

export class MemStorage implements IStorage {
  private todos: Map<number, Todo>;
  private turnRecords: Map<number, TurnRecordRow>;
  private noteChunks: Map<string, NoteChunk>;
  private nextId = { todo: 1, turn: 1, note: 1 };

  constructor() {
    this.todos = new Map();
    this.turnRecords = new Map();
    this.noteChunks = new Map();
  }

  // Todos
  async createTodo(insertTodo: InsertTodo): Promise<Todo> {
    const id = this.nextId.todo++;
    const todo: Todo = {
      id,
      text: insertTodo.text,
      dueAt: insertTodo.dueAt ?? null,
      status: insertTodo.status,
      createdAt: new Date(),
    };
    this.todos.set(id, todo);
    return todo;
  }

  async listTodos(status?: TodoStatus): Promise<Todo[]> {
    return Array.from(this.todos.values())
      .filter(todo => !status || todo.status === status)
      .sort(newestFirst);
  }

  // Turn records
  async insertTurnRecord(record: InsertTurnRecord): Promise<TurnRecordRow> {
    const id = this.nextId.turn++;
    const row: TurnRecordRow = {
      id,
      userMessage: record.userMessage,
      assistantReply: record.assistantReply,
      toolsUsed: record.toolsUsed ?? null,
      retrievedDocIds: record.retrievedDocIds ?? null,
      intent: record.intent,
      createdAt: new Date(),
    };
    this.turnRecords.set(id, row);
    return row;
  }

  async listTurnRecords(limit: number): Promise<TurnRecordRow[]> {
    return Array.from(this.turnRecords.values()).sort(newestFirst).slice(0, limit);
  }

  // Note chunks
  async upsertNoteChunk(chunk: InsertNoteChunk): Promise<NoteChunk> {
    const existing = this.noteChunks.get(chunk.docId);
    const row: NoteChunk = {
      id: existing?.id ?? this.nextId.note++,
      docId: chunk.docId,
      text: chunk.text,
      embedding: chunk.embedding,
      createdAt: existing?.createdAt ?? new Date(),
    };
    this.noteChunks.set(chunk.docId, row);
    return row;
  }

  async listNoteChunks(): Promise<NoteChunk[]> {
    return Array.from(this.noteChunks.values());
  }

  async rawQuery(_query: string, _params?: unknown[]): Promise<RawRow[]> {
    throw new Error("rawQuery requires a database; set DATABASE_URL");
  }
}

export class DbStorage implements IStorage {
  private sql;
  private db;

  constructor(databaseUrl: string) {
    this.sql = neon(databaseUrl);
    this.db = drizzle(this.sql);
  }

  // Todos
  async createTodo(insertTodo: InsertTodo): Promise<Todo> {
    const results = await this.db
      .insert(todosTable)
      .values(insertTodo)
      .returning();
    return results[0];
  }

  async listTodos(status?: TodoStatus): Promise<Todo[]> {
    return this.db
      .select()
      .from(todosTable)
      .where(status ? eq(todosTable.status, status) : undefined)
      .orderBy(desc(todosTable.createdAt), desc(todosTable.id));
  }

  // Turn records
  async insertTurnRecord(record: InsertTurnRecord): Promise<TurnRecordRow> {
    const results = await this.db
      .insert(turnRecordsTable)
      .values(record)
      .returning();
    return results[0];
  }

  async listTurnRecords(limit: number): Promise<TurnRecordRow[]> {
    return this.db
      .select()
      .from(turnRecordsTable)
      .orderBy(desc(turnRecordsTable.createdAt), desc(turnRecordsTable.id))
      .limit(limit);
  }

  // Note chunks
  async upsertNoteChunk(chunk: InsertNoteChunk): Promise<NoteChunk> {
    const results = await this.db
      .insert(noteChunksTable)
      .values(chunk)
      .onConflictDoUpdate({
        target: noteChunksTable.docId,
        set: { text: chunk.text, embedding: chunk.embedding },
      })
      .returning();
    return results[0];
  }

  async listNoteChunks(): Promise<NoteChunk[]> {
    return this.db.select().from(noteChunksTable);
  }

  async rawQuery(query: string, params: unknown[] = []): Promise<RawRow[]> {
    return this.sql(query, params);
  }
}

/**
 * Postgres when a connection string is configured, memory otherwise.
 */
export function createStorage(databaseUrl?: string): IStorage {
  return databaseUrl ? new DbStorage(databaseUrl) : new MemStorage();
}
