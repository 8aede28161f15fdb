/**
 * Intent Classifier
 *
 * Asks the chat model to label an utterance TODO, EVENT or QA. The reply is
 * upper-cased and only its first whitespace-delimited token counts; anything
 * outside the closed label set collapses to ANSWER_QUESTION.
 *
 * Total over model output: malformed or verbose replies never raise. Only a
 * failure of the model call itself propagates.
 */

import { INTENT_CLASSIFIER_PROMPT } from "../config/prompts";
import { TASK_TEMPERATURES } from "../config/models";
import type { ChatModel } from "../llm/client";
import { Intent, type Utterance } from "./types";

const LABEL_TO_INTENT: Record<string, Intent> = {
  TODO: Intent.CREATE_TASK,
  EVENT: Intent.CREATE_EVENT,
  QA: Intent.ANSWER_QUESTION,
};

export function parseIntentLabel(raw: string): Intent {
  const [firstToken = ""] = raw.trim().toUpperCase().split(/\s+/);
  return LABEL_TO_INTENT[firstToken] ?? Intent.ANSWER_QUESTION;
}

export class IntentClassifier {
  constructor(private readonly chat: ChatModel) {}

  async classify(utterance: Utterance): Promise<Intent> {
    const raw = await this.chat.complete(
      [
        { role: "system", content: INTENT_CLASSIFIER_PROMPT },
        { role: "user", content: utterance.raw.trim() },
      ],
      { temperature: TASK_TEMPERATURES.INTENT_CLASSIFICATION },
    );
    return parseIntentLabel(raw);
  }
}
