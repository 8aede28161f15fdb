/**
 * Command Grammar
 *
 * Recognizes the two explicit command syntaxes and turns them into typed
 * slots without any model call:
 *
 *   todo: <text>[ | <due>]
 *   event: <title> | <start> | <end>
 *
 * Prefixes are matched case-insensitively on the normalized utterance.
 * This is always the first thing tried on a turn.
 */

import { COMMAND_CONSTANTS } from "../config/constants";
import { CommandSyntaxError } from "../utils/errorHandler";
import { parseCommandDateTime } from "./dateTime";
import type { EventSlots, TaskSlots, Utterance } from "./types";

export type ParsedCommand =
  | { kind: "task"; slots: TaskSlots }
  | { kind: "event"; slots: EventSlots };

const { TODO_PREFIX, EVENT_PREFIX, SEGMENT_SEPARATOR, TODO_USAGE, EVENT_USAGE } = COMMAND_CONSTANTS;

/**
 * Returns null when the utterance carries no command prefix.
 * Throws CommandSyntaxError / DateTimeParseError for a prefixed but
 * malformed command; those are never coerced into something else.
 */
export function parseCommand(utterance: Utterance): ParsedCommand | null {
  const body = utterance.raw.trim();

  if (utterance.normalized.startsWith(TODO_PREFIX)) {
    return { kind: "task", slots: parseTodoBody(body.slice(TODO_PREFIX.length)) };
  }
  if (utterance.normalized.startsWith(EVENT_PREFIX)) {
    return { kind: "event", slots: parseEventBody(body.slice(EVENT_PREFIX.length)) };
  }
  return null;
}

function parseTodoBody(rawBody: string): TaskSlots {
  const body = rawBody.trim();
  const separatorIndex = body.indexOf(SEGMENT_SEPARATOR);

  const text = (separatorIndex === -1 ? body : body.slice(0, separatorIndex)).trim();
  const duePart = separatorIndex === -1 ? "" : body.slice(separatorIndex + 1).trim();

  if (!text) {
    throw new CommandSyntaxError("A todo needs some text.", TODO_USAGE);
  }

  return {
    text,
    due: duePart ? parseCommandDateTime(duePart) : null,
  };
}

function parseEventBody(rawBody: string): EventSlots {
  const parts = rawBody.trim().split(SEGMENT_SEPARATOR).map(p => p.trim());
  if (parts.length < 3) {
    throw new CommandSyntaxError("Invalid event syntax.", EVENT_USAGE);
  }

  const [title, startText, endText] = parts;
  if (!title) {
    throw new CommandSyntaxError("An event needs a title.", EVENT_USAGE);
  }

  const start = parseCommandDateTime(startText);
  const end = parseCommandDateTime(endText);
  if (end.getTime() <= start.getTime()) {
    throw new CommandSyntaxError("The event must end after it starts.", EVENT_USAGE);
  }

  return { title, start, end };
}
