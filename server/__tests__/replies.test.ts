import { describe, it, expect } from 'vitest';
import {
  calendarEventReply,
  localTodoReply,
  withDegradationNote,
  workspaceTodoReply,
} from '../assistant/replies';

const NOW = new Date('2025-11-14T10:00:00Z');

describe('localTodoReply', () => {
  it('names the id, text and due date', () => {
    expect(localTodoReply({ id: 7, text: 'Buy milk', dueAt: new Date('2025-11-15T09:30:00Z') }))
      .toBe("Created todo #7: 'Buy milk' (due: 2025-11-15T09:30:00).");
  });

  it('says when there is no due date', () => {
    expect(localTodoReply({ id: 1, text: 'Buy milk', dueAt: null }))
      .toBe("Created todo #1: 'Buy milk' (due: no due date).");
  });
});

describe('workspaceTodoReply', () => {
  it('adds the page link when there is one', () => {
    expect(workspaceTodoReply('Buy milk', null, 'https://workspace.example/page-1'))
      .toBe("Created todo 'Buy milk' in your workspace (due: no due date).\nOpen in workspace: https://workspace.example/page-1");
  });

  it('omits the link line otherwise', () => {
    expect(workspaceTodoReply('Buy milk', new Date('2025-11-15T00:00:00Z')))
      .toBe("Created todo 'Buy milk' in your workspace (due: 2025-11-15T00:00:00).");
  });
});

describe('withDegradationNote', () => {
  it('appends the reason after a blank line', () => {
    expect(withDegradationNote('Created.', 'timeout'))
      .toBe('Created.\n\nNote: the workspace service could not save this (timeout), so it was saved to your local todo list instead.');
  });
});

describe('calendarEventReply', () => {
  it('describes the slot relative to today', () => {
    const reply = calendarEventReply({
      title: 'Dentist',
      start: new Date('2025-11-15T23:00:00Z'),
      end: new Date('2025-11-16T00:00:00Z'),
      link: 'https://calendar.example/evt-1',
    }, NOW);

    expect(reply).toBe("Created calendar event 'Dentist' for tomorrow, 11pm–12am.\nGo to calendar event: https://calendar.example/evt-1");
  });

  it('uses a placeholder when the calendar returned no link', () => {
    const reply = calendarEventReply({
      title: 'Review',
      start: new Date('2025-11-20T14:30:00Z'),
      end: new Date('2025-11-20T15:00:00Z'),
      link: null,
    }, NOW);

    expect(reply).toBe("Created calendar event 'Review' for Nov 20, 2:30pm–3pm.\nGo to calendar event: (no link)");
  });
});
