/**
 * Application wiring: builds every collaborator from the loaded config and
 * mounts the HTTP surface on an express app.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Server } from "http";
import type { AppConfig } from "./config/env";
import { createChatModel, type ChatModel } from "./llm/client";
import { IntentClassifier } from "./assistant/intentClassifier";
import { SlotExtractor } from "./assistant/slotExtractor";
import { TurnLogger } from "./assistant/turnLogger";
import { TurnOrchestrator } from "./assistant/orchestrator";
import { CapabilitySourceRegistry } from "./providers/registry";
import { McpWorkspaceSource } from "./providers/mcpWorkspace";
import { GoogleCalendarProvider } from "./providers/googleCalendar";
import { createLocalTaskProvider } from "./providers/localTasks";
import type { CalendarProvider, LocalTaskProvider } from "./providers/types";
import { OpenAIEmbedder, buildRagAnswerer, type RagAnswerer } from "./rag";
import { createStorage, type IStorage } from "./storage";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes } from "./routes";
import { handleRouteError } from "./utils/errorHandler";
import { logInfo } from "./utils/logger";

export type AssistantServices = {
  storage: IStorage;
  chat: ChatModel;
  localTasks: LocalTaskProvider;
  calendar: CalendarProvider;
  rag: RagAnswerer;
  capabilities: CapabilitySourceRegistry;
  orchestrator: TurnOrchestrator;
};

export function createServices(config: Readonly<AppConfig>): AssistantServices {
  const storage = createStorage(config.databaseUrl);
  const chat = createChatModel(config.llm);
  const localTasks = createLocalTaskProvider(storage);
  const calendar = new GoogleCalendarProvider(config.calendar);

  const embedder = new OpenAIEmbedder({
    model: config.rag.embeddingModel,
    timeoutMs: config.externalCallTimeoutMs,
    apiKey: config.llm.openaiApiKey,
    baseUrl: config.llm.baseUrl,
  });
  const rag = buildRagAnswerer({
    storage,
    embedder,
    chat,
    topK: config.rag.topK,
    timeoutMs: config.externalCallTimeoutMs,
  });

  const capabilities = new CapabilitySourceRegistry(config.externalCallTimeoutMs);
  if (config.workspace) {
    capabilities.register(new McpWorkspaceSource(config.workspace));
  }

  const orchestrator = new TurnOrchestrator({
    classifier: new IntentClassifier(chat),
    extractor: new SlotExtractor(chat),
    capabilities,
    localTasks,
    calendar,
    rag,
    turnLogger: new TurnLogger(storage, config.externalCallTimeoutMs),
    workspace: config.workspace,
    timeoutMs: config.externalCallTimeoutMs,
  });

  logInfo("[App] Services ready", {
    storage: config.databaseUrl ? "postgres" : "memory",
    model: config.llm.model,
    workspace: config.workspace ? "enabled" : "disabled",
  });

  return { storage, chat, localTasks, calendar, rag, capabilities, orchestrator };
}

export async function createApp(
  services: AssistantServices,
  options: { apiToken?: string } = {},
): Promise<{ app: Express; server: Server }> {
  const app = express();
  app.use(express.json({ limit: "100kb" }));
  app.use(addSecurityHeaders);

  const server = await registerRoutes(app, {
    orchestrator: services.orchestrator,
    localTasks: services.localTasks,
    storage: services.storage,
    apiToken: options.apiToken,
  });

  // Errors passed to next() by middleware
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "HTTP");
  });

  return { app, server };
}
