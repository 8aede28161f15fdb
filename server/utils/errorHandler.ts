import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { logError as writeErrorLog } from "./logger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * An explicit `todo:` / `event:` command that could not be parsed.
 * The message always ends with the usage the user should follow.
 */
export class CommandSyntaxError extends ValidationError {
  usage: string;
  constructor(message: string, usage: string) {
    super(`${message} Use: ${usage}`);
    this.name = "CommandSyntaxError";
    this.usage = usage;
  }
}

export class DateTimeParseError extends ValidationError {
  value: string;
  constructor(value: string, acceptedFormats: readonly string[]) {
    super(`Could not parse datetime from '${value}'. Accepted formats: ${acceptedFormats.join(", ")}.`);
    this.name = "DateTimeParseError";
    this.value = value;
  }
}

export class AuthenticationError extends Error implements AppError {
  statusCode = 401;
  isOperational = true;
  constructor(message = "Authentication required") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service} error: ${message}`, options);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

export class TimeoutError extends Error implements AppError {
  statusCode = 504;
  isOperational = true;
  operation: string;
  timeoutMs: number;
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  constructor(message = "Rate limit exceeded") {
    super(message);
    this.name = "RateLimitError";
  }
}

function hasStatusCode(error: unknown): error is { statusCode: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export interface HandleRouteErrorOptions {
  /** Replace the raw message of 5xx errors with a user-facing one */
  userFacing?: boolean;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
  options?: HandleRouteErrorOptions,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = statusCode >= 500 && options?.userFacing
    ? classifyPipelineError(error).userMessage
    : getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  writeErrorLog(`[${context}] ${message}`, stack ? { stack } : undefined);
}

export interface ClassifiedError {
  type: "llm_quota" | "llm_auth" | "service_unavailable" | "timeout" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
}

function getErrorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && (typeof err.code === "string" || typeof err.code === "number")) {
    return err.code;
  }
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/**
 * Maps a failed turn to the message shown to the user.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = getErrorCode(err);
  const cause = err instanceof Error ? err.cause : undefined;
  const causeCode = getErrorCode(cause);

  if (err instanceof TimeoutError) {
    return {
      type: "timeout",
      userMessage: "Sorry, that took too long. The assistant's services did not answer in time, please try again.",
      errorMessage, errorCode,
    };
  }

  if (errorCode === "insufficient_quota" || causeCode === "insufficient_quota" ||
    causeCode === 429 || errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return {
      type: "llm_quota",
      userMessage: "I can't process this right now: the language model quota has been exceeded.",
      errorMessage, errorCode,
    };
  }

  if (causeCode === 401 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return {
      type: "llm_auth",
      userMessage: "I can't process this right now: the language model service rejected our credentials.",
      errorMessage, errorCode,
    };
  }

  if (err instanceof ExternalServiceError) {
    return {
      type: "service_unavailable",
      userMessage: `I can't process this right now: the ${err.service} service is unavailable.`,
      errorMessage, errorCode,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I hit an internal error while processing that request.",
    errorMessage, errorCode,
  };
}
