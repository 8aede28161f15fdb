/**
 * Application Constants
 *
 * Centralized values used across the assistant. Anything an operator may
 * want to change lives in config/env.ts instead.
 */

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Command grammar configuration
 */
export const COMMAND_CONSTANTS = {
  TODO_PREFIX: "todo:",
  EVENT_PREFIX: "event:",
  SEGMENT_SEPARATOR: "|",

  /**
   * Shown to the user whenever an explicit command cannot be parsed.
   */
  TODO_USAGE: "todo: Buy milk | 2025-11-15",
  EVENT_USAGE: "event: Title | 2025-11-15 09:00 | 2025-11-15 10:00",

  ACCEPTED_DATETIME_FORMATS: ["YYYY-MM-DD", "YYYY-MM-DD HH:MM", "YYYY-MM-DDTHH:MM"],
} as const;

/**
 * Event scheduling defaults
 */
export const EVENT_CONSTANTS = {
  /**
   * Duration applied when no end time is known.
   */
  DEFAULT_DURATION_MS: HOUR_MS,

  /**
   * How far ahead an event is scheduled when extraction yields nothing usable.
   */
  FALLBACK_START_OFFSET_MS: 24 * HOUR_MS,

  /**
   * Zone events are written in. Command and model datetimes without an
   * offset are read in the same zone, so the typed wall-clock time is kept.
   */
  CALENDAR_TIME_ZONE: "UTC",
} as const;

/**
 * Tool names reported in turn results and turn records.
 */
export const TOOL_NAMES = {
  CREATE_TODO: "create_todo",
  CREATE_EVENT: "create_event",
} as const;

/**
 * Timeout configuration
 */
export const TIMEOUT_CONSTANTS = {
  /**
   * Default bound for every external call (milliseconds).
   */
  EXTERNAL_CALL_TIMEOUT_MS: 30000,
} as const;

/**
 * Retrieval configuration
 */
export const RAG_CONSTANTS = {
  DEFAULT_TOP_K: 5,
  NOTE_EXTENSIONS: [".md", ".txt"],
} as const;

/**
 * Rate limiting configuration
 */
export const RATE_LIMIT_CONSTANTS = {
  CHAT_WINDOW_MS: MINUTE_MS,
  CHAT_MAX_REQUESTS: 30,
} as const;

/**
 * Listing limits for the audit endpoints.
 */
export const LIST_LIMITS = {
  TURNS_DEFAULT: 20,
  TURNS_MAX: 100,
} as const;
