/**
 * Environment Configuration
 *
 * Reads the process environment once at start-up and turns it into an
 * immutable AppConfig. Components receive the slice they need at
 * construction time and never consult process.env themselves.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { LLM_MODELS, EMBEDDING_MODELS } from "./models";
import { TIMEOUT_CONSTANTS, RAG_CONSTANTS } from "./constants";
import type { LogLevel } from "../utils/logger";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  API_TOKEN: optionalString,
  DATABASE_URL: optionalString,

  LLM_MODEL: z.string().trim().min(1).default(LLM_MODELS.LOCAL_DEFAULT),
  LLM_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  OPENAI_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().trim().min(1).default(EMBEDDING_MODELS.DEFAULT),
  RAG_TOP_K: z.coerce.number().int().min(1).max(50).default(RAG_CONSTANTS.DEFAULT_TOP_K),
  EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().min(100).default(TIMEOUT_CONSTANTS.EXTERNAL_CALL_TIMEOUT_MS),

  GOOGLE_TOKEN_FILE: z.string().trim().min(1).default("google_token.json"),
  GOOGLE_CALENDAR_ID: z.string().trim().min(1).default("primary"),

  NOTION_INTEGRATION_TOKEN: optionalString,
  NOTION_DATABASE_ID: optionalString,
  WORKSPACE_MCP_IMAGE: z.string().trim().min(1).default("mcp/notion"),
  WORKSPACE_TITLE_PROPERTY: z.string().trim().min(1).default("Name"),
  WORKSPACE_DUE_PROPERTY: z.string().trim().min(1).default("Due"),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: optionalString,
});

export type LLMConfig = {
  model: string;
  baseUrl: string;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  geminiApiKey?: string;
  timeoutMs: number;
};

export type RagConfig = {
  embeddingModel: string;
  topK: number;
};

export type CalendarConfig = {
  tokenFile: string;
  calendarId: string;
};

export type WorkspaceConfig = {
  integrationToken: string;
  databaseId: string;
  image: string;
  titleProperty: string;
  dueProperty: string;
};

export type AppConfig = {
  nodeEnv: "development" | "production" | "test";
  port: number;
  apiToken?: string;
  databaseUrl?: string;
  externalCallTimeoutMs: number;
  llm: LLMConfig;
  rag: RagConfig;
  calendar: CalendarConfig;
  /**
   * Present only when both the integration token and the target database
   * are configured; otherwise the remote workspace is never consulted.
   */
  workspace?: WorkspaceConfig;
  logging: {
    level: LogLevel;
    dir?: string;
  };
};

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`[Config] Invalid environment: ${fromZodError(parsed.error).message}`);
  }
  const e = parsed.data;

  const workspace: WorkspaceConfig | undefined =
    e.NOTION_INTEGRATION_TOKEN && e.NOTION_DATABASE_ID
      ? {
          integrationToken: e.NOTION_INTEGRATION_TOKEN,
          databaseId: e.NOTION_DATABASE_ID,
          image: e.WORKSPACE_MCP_IMAGE,
          titleProperty: e.WORKSPACE_TITLE_PROPERTY,
          dueProperty: e.WORKSPACE_DUE_PROPERTY,
        }
      : undefined;

  return deepFreeze<AppConfig>({
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    apiToken: e.API_TOKEN,
    databaseUrl: e.DATABASE_URL,
    externalCallTimeoutMs: e.EXTERNAL_CALL_TIMEOUT_MS,
    llm: {
      model: e.LLM_MODEL,
      baseUrl: e.LLM_BASE_URL,
      openaiApiKey: e.OPENAI_API_KEY,
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      geminiApiKey: e.GEMINI_API_KEY,
      timeoutMs: e.EXTERNAL_CALL_TIMEOUT_MS,
    },
    rag: {
      embeddingModel: e.EMBEDDING_MODEL,
      topK: e.RAG_TOP_K,
    },
    calendar: {
      tokenFile: e.GOOGLE_TOKEN_FILE,
      calendarId: e.GOOGLE_CALENDAR_ID,
    },
    workspace,
    logging: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
    },
  });
}
