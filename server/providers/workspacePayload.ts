/**
 * Maps task slots onto the workspace's page-creation payload and reads the
 * workspace's "unknown property" failures back into a property name.
 */

import type { TaskSlots } from "../assistant/types";
import { formatIsoLocal, toDateAnchor } from "../assistant/dateTime";

export type WorkspaceTarget = {
  databaseId: string;
  titleProperty: string;
  dueProperty: string;
};

export type PagePayload = {
  parent: { database_id: string };
  properties: Record<string, unknown>;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function rejectionPatterns(property: string): RegExp[] {
  const escaped = escapeRegExp(property);
  const quoted = `["']?${escaped}["']?`;
  return [
    new RegExp(`(?:^|[\\s:])${quoted} is not a property that exists`, "i"),
    new RegExp(`property ${quoted} does not exist`, "i"),
    new RegExp(`Unrecognized key\\(s\\)[^\\n]*'${escaped}'`, "i"),
  ];
}

/**
 * Midnight dues are sent as a plain date so the workspace shows no time.
 */
export function formatWorkspaceDate(due: Date): string {
  const isMidnight = due.getUTCHours() === 0 && due.getUTCMinutes() === 0 && due.getUTCSeconds() === 0;
  return isMidnight ? toDateAnchor(due) : formatIsoLocal(due);
}

export function buildPagePayload(
  slots: TaskSlots,
  target: WorkspaceTarget,
  omit: ReadonlySet<string> = new Set(),
): PagePayload {
  const properties: Record<string, unknown> = {};

  if (!omit.has(target.titleProperty)) {
    properties[target.titleProperty] = { title: [{ text: { content: slots.text } }] };
  }
  if (slots.due && !omit.has(target.dueProperty)) {
    properties[target.dueProperty] = { date: { start: formatWorkspaceDate(slots.due) } };
  }

  return { parent: { database_id: target.databaseId }, properties };
}

/**
 * Returns the payload property a failure message names, or null when the
 * failure is about something else. Only properties actually sent count.
 */
export function findRejectedProperty(message: string, payload: PagePayload): string | null {
  const sent = Object.keys(payload.properties);
  return sent.find(property => rejectionPatterns(property).some(pattern => pattern.test(message))) ?? null;
}
