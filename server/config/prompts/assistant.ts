/**
 * Assistant Prompts
 *
 * Prompts for the turn pipeline: intent classification, slot extraction
 * and retrieval-augmented answers. Tests assert these strings verbatim, so
 * any wording change here is a behaviour change.
 */

/**
 * Intent classifier prompt.
 * The model must answer with exactly one of the three labels.
 */
export const INTENT_CLASSIFIER_PROMPT = `You are an intent classifier for a personal assistant.
Given a single user message, decide if the primary intent is:
- TODO: creating or updating a personal todo/reminder/task.
- EVENT: scheduling or modifying a calendar event/meeting.
- QA: asking a question or chatting (no tool call).
Reply with exactly one word: TODO, EVENT, or QA.`;

/**
 * Todo slot extraction prompt.
 * `today` is the turn's date anchor (YYYY-MM-DD) so relative phrases
 * resolve the same way for every call within one turn.
 */
export function buildTaskExtractionPrompt(today: string): string {
  return `You extract todo information from natural language.
Given one user message, output ONLY a JSON object with keys:
{ "text": string, "due": string | null }.
- 'due' should be an ISO 8601 datetime (e.g. 2025-11-15T09:00:00) or null.
- Today is ${today}. Interpret relative dates like 'today', 'tomorrow', or weekdays relative to this date.
- Only an explicit deadline ("by Friday", "due tomorrow", "before 5pm") is a due date.
- Times and dates that describe the task itself (a flight at 7am, a meeting on Monday) belong in 'text', not in 'due'.
Do not include any explanation text, only the JSON.`;
}

/**
 * Event slot extraction prompt.
 */
export function buildEventExtractionPrompt(today: string): string {
  return `You extract calendar event details from natural language.
Given one user message, output ONLY a JSON object with keys:
{ "title": string, "start": string, "end": string }.
- 'start' and 'end' must be full ISO 8601 datetimes (e.g. 2025-11-15T09:00:00).
- Today is ${today}. Interpret relative dates like 'today', 'tomorrow', or weekdays relative to this date.
- If the user does not specify an end time, set 'end' to exactly 1 hour after 'start'.
Do not include any explanation text, only the JSON.`;
}

/**
 * Retrieval-augmented answer prompt.
 * Retrieved note snippets are background only; the answer stays direct.
 */
export const RAG_ANSWER_PROMPT = `You are a concise personal assistant.
Use the provided context only as factual background.
Always answer the user's question directly and do not ask follow-up questions about their goals or intentions unless absolutely necessary.`;

export function buildRagUserMessage(context: string, question: string): string {
  return `Context:\n${context}\n\nQuestion: ${question}`;
}
