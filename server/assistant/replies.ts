/**
 * Reply text for completed actions.
 */

import { formatDateTimeRange, formatIsoLocal } from "./dateTime";

function describeDue(due: Date | null): string {
  return due ? formatIsoLocal(due) : "no due date";
}

export function localTodoReply(todo: { id: number; text: string; dueAt: Date | null }): string {
  return `Created todo #${todo.id}: '${todo.text}' (due: ${describeDue(todo.dueAt)}).`;
}

export function workspaceTodoReply(text: string, due: Date | null, url?: string): string {
  const reply = `Created todo '${text}' in your workspace (due: ${describeDue(due)}).`;
  return url ? `${reply}\nOpen in workspace: ${url}` : reply;
}

export function withDegradationNote(reply: string, reason: string): string {
  return `${reply}\n\nNote: the workspace service could not save this (${reason}), so it was saved to your local todo list instead.`;
}

export function calendarEventReply(
  event: { title: string; start: Date; end: Date; link?: string | null },
  now: Date,
): string {
  const when = formatDateTimeRange(event.start, event.end, now);
  return `Created calendar event '${event.title}' for ${when}.\nGo to calendar event: ${event.link || "(no link)"}`;
}
