/**
 * Turn Pipeline Types
 *
 * Core type definitions shared by the command grammar, the classifier,
 * the slot extractor, the capability resolver and the orchestrator.
 */

export enum Intent {
  CREATE_TASK = "CREATE_TASK",
  CREATE_EVENT = "CREATE_EVENT",
  ANSWER_QUESTION = "ANSWER_QUESTION",
}

/**
 * How the intent of a turn was decided: by an explicit command prefix or
 * by the language model.
 */
export type IntentDetectionMethod = "grammar" | "llm";

/**
 * The user's message. `normalized` (trimmed, lower-cased) is used only for
 * prefix matching; everything user-visible is taken from `raw`.
 */
export type Utterance = Readonly<{
  raw: string;
  normalized: string;
}>;

export function createUtterance(raw: string): Utterance {
  return Object.freeze({ raw, normalized: raw.trim().toLowerCase() });
}

export type TaskSlots = {
  text: string;
  due: Date | null;
};

export type EventSlots = {
  title: string;
  start: Date;
  end: Date;
};

/**
 * Result envelope of a remote capability. Failures carry the provider's
 * own human-readable message.
 */
export type RemoteEnvelope =
  | { ok: true; url?: string; data: unknown }
  | { ok: false; message: string };

/**
 * A named operation discovered at runtime from a remote provider.
 */
export type Capability = {
  name: string;
  description?: string;
  invoke(args: Record<string, unknown>): Promise<RemoteEnvelope>;
};

/**
 * Produced exactly once per completed turn, degraded or not.
 */
export type DispatchResult = {
  reply: string;
  toolsUsed: string[];
  retrievedIds: string[];
  intent: Intent;
  detectionMethod: IntentDetectionMethod;
  /** True when a fallback provider completed the request */
  degraded: boolean;
};

export type TurnRecordInput = {
  userMessage: string;
  reply: string;
  toolsUsed: readonly string[];
  retrievedIds: readonly string[];
  intent: Intent;
};
