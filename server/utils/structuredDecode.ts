/**
 * Best-effort structured decode of free-form model output.
 *
 * Contract: take the span from the first `{` to the last `}` of the reply,
 * parse it as JSON and validate it against a zod schema. Leading or
 * trailing commentary around the object is ignored. Every failure (no
 * braces, invalid JSON, wrong shape) yields null so the caller can apply
 * its own fallback.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { getErrorMessage } from "./errorHandler";
import { logDebug } from "./logger";

export function extractJsonObjectSpan(raw: string): string | null {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) return null;
  return raw.slice(start, end + 1);
}

export function decodeStructured<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
  const span = extractJsonObjectSpan(raw);
  if (span === null) {
    logDebug("[StructuredDecode] No JSON object in model reply", { replyLength: raw.length });
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch (err) {
    logDebug("[StructuredDecode] Model reply is not valid JSON", { error: getErrorMessage(err) });
    return null;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logDebug("[StructuredDecode] Model reply has the wrong shape", { error: getErrorMessage(result.error) });
    return null;
  }
  return result.data;
}
