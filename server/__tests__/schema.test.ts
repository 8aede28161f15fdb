import { describe, it, expect } from 'vitest';
import {
  EMBEDDING_DIMENSIONS,
  insertNoteChunkSchema,
  insertTodoSchema,
  insertTurnRecordSchema,
} from '@shared/schema';

describe('insert schemas', () => {
  it('accepts a note chunk with a full-size embedding', () => {
    const embedding = new Array<number>(EMBEDDING_DIMENSIONS).fill(0.5);

    const parsed = insertNoteChunkSchema.parse({ docId: 'home/keys.md', text: 'Spare keys live in the blue drawer.', embedding });

    expect(parsed.docId).toBe('home/keys.md');
    expect(parsed.embedding).toHaveLength(EMBEDDING_DIMENSIONS);
  });

  it('rejects an embedding of the wrong size', () => {
    const result = insertNoteChunkSchema.safeParse({ docId: 'home/keys.md', text: 'x', embedding: [1, 2, 3] });

    expect(result.success).toBe(false);
  });

  it('trims todo text and defaults the status', () => {
    expect(insertTodoSchema.parse({ text: '  Buy milk  ' })).toMatchObject({ text: 'Buy milk', status: 'open' });
  });

  it('rejects blank todo text', () => {
    expect(insertTodoSchema.safeParse({ text: '   ' }).success).toBe(false);
  });

  it('accepts a turn record without tools or documents', () => {
    expect(insertTurnRecordSchema.safeParse({
      userMessage: 'Where are my keys?',
      assistantReply: 'In the blue drawer.',
      intent: 'ANSWER_QUESTION',
    }).success).toBe(true);
  });
});
