/**
 * Turn Logger
 *
 * Appends one record per completed turn. Lists are stored comma-joined,
 * or null when empty. A failed or timed-out write is logged and never
 * rethrown; the turn's reply is returned either way.
 */

import type { InsertTurnRecord } from "@shared/schema";
import type { IStorage } from "../storage";
import { logError } from "../utils/errorHandler";
import { withTimeout } from "../utils/timeout";
import type { TurnRecordInput } from "./types";

export function joinOrNull(values: readonly string[]): string | null {
  return values.length > 0 ? values.join(",") : null;
}

export function toTurnRecordRow(input: TurnRecordInput): InsertTurnRecord {
  return {
    userMessage: input.userMessage,
    assistantReply: input.reply,
    toolsUsed: joinOrNull(input.toolsUsed),
    retrievedDocIds: joinOrNull(input.retrievedIds),
    intent: input.intent,
  };
}

export class TurnLogger {
  constructor(
    private readonly storage: IStorage,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Resolves to true when the record was stored.
   */
  async record(input: TurnRecordInput): Promise<boolean> {
    try {
      await withTimeout(
        this.storage.insertTurnRecord(toTurnRecordRow(input)),
        this.timeoutMs,
        "Turn record write",
      );
      return true;
    } catch (err) {
      logError("TurnLogger", err);
      return false;
    }
  }
}
