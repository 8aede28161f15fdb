/**
 * Slot Extractor
 *
 * One chat-model call per extraction, decoded with decodeStructured. When
 * the reply cannot be used the documented fallback applies instead of an
 * error:
 * - task:  text = the utterance, no due date
 * - event: title = the utterance, start = anchor + 1 day, end = start + 1 hour
 *
 * `now` is the turn's anchor. It is written into the prompt and used for
 * the fallbacks so every call inside one turn agrees on "today".
 */

import { z } from "zod";
import { buildEventExtractionPrompt, buildTaskExtractionPrompt } from "../config/prompts";
import { TASK_TEMPERATURES } from "../config/models";
import { EVENT_CONSTANTS } from "../config/constants";
import type { ChatModel } from "../llm/client";
import { decodeStructured } from "../utils/structuredDecode";
import { logDebug, logWarn } from "../utils/logger";
import { parseModelDateTime, toDateAnchor } from "./dateTime";
import type { EventSlots, TaskSlots, Utterance } from "./types";

const taskReplySchema = z.object({
  text: z.string().trim().min(1),
  due: z.unknown(),
});

const eventReplySchema = z.object({
  title: z.string().trim().min(1),
  start: z.string(),
  end: z.unknown(),
});

export function fallbackTaskSlots(utterance: Utterance): TaskSlots {
  return { text: utterance.raw.trim(), due: null };
}

export function fallbackEventSlots(utterance: Utterance, now: Date): EventSlots {
  const start = new Date(now.getTime() + EVENT_CONSTANTS.FALLBACK_START_OFFSET_MS);
  return {
    title: utterance.raw.trim(),
    start,
    end: new Date(start.getTime() + EVENT_CONSTANTS.DEFAULT_DURATION_MS),
  };
}

export function taskSlotsFromReply(raw: string, utterance: Utterance): TaskSlots {
  const decoded = decodeStructured(raw, taskReplySchema);
  if (!decoded) return fallbackTaskSlots(utterance);

  const due = parseModelDateTime(decoded.due);
  if (decoded.due != null && decoded.due !== "" && !due) {
    logDebug("[SlotExtractor] Dropping unparseable due date", { due: decoded.due });
  }
  return { text: decoded.text, due };
}

export function eventSlotsFromReply(raw: string, utterance: Utterance, now: Date): EventSlots {
  const decoded = decodeStructured(raw, eventReplySchema);
  const start = decoded ? parseModelDateTime(decoded.start) : null;
  if (!decoded || !start) return fallbackEventSlots(utterance, now);

  const defaultEnd = new Date(start.getTime() + EVENT_CONSTANTS.DEFAULT_DURATION_MS);
  const end = parseModelDateTime(decoded.end);

  if (end && end.getTime() <= start.getTime()) {
    logWarn("[SlotExtractor] Extracted event ends before it starts; using the default duration", {
      start: decoded.start,
      end: decoded.end,
    });
    return { title: decoded.title, start, end: defaultEnd };
  }
  return { title: decoded.title, start, end: end ?? defaultEnd };
}

export class SlotExtractor {
  constructor(private readonly chat: ChatModel) {}

  async extractTask(utterance: Utterance, now: Date): Promise<TaskSlots> {
    const raw = await this.chat.complete(
      [
        { role: "system", content: buildTaskExtractionPrompt(toDateAnchor(now)) },
        { role: "user", content: utterance.raw.trim() },
      ],
      { temperature: TASK_TEMPERATURES.SLOT_EXTRACTION },
    );
    return taskSlotsFromReply(raw, utterance);
  }

  async extractEvent(utterance: Utterance, now: Date): Promise<EventSlots> {
    const raw = await this.chat.complete(
      [
        { role: "system", content: buildEventExtractionPrompt(toDateAnchor(now)) },
        { role: "user", content: utterance.raw.trim() },
      ],
      { temperature: TASK_TEMPERATURES.SLOT_EXTRACTION },
    );
    return eventSlotsFromReply(raw, utterance, now);
  }
}
