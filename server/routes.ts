import type { Express } from "express";
import { createServer, type Server } from "http";
import { RATE_LIMIT_CONSTANTS } from "./config/constants";
import type { TurnOrchestrator } from "./assistant/orchestrator";
import type { LocalTaskProvider } from "./providers/types";
import type { IStorage } from "./storage";
import { requireApiToken, rateLimit } from "./middleware/security";
import {
  validate,
  parseQuery,
  chatRequestSchema,
  todosQuerySchema,
  turnsQuerySchema,
} from "./middleware/validation";
import { handleRouteError } from "./utils/errorHandler";

export type RouteServices = {
  orchestrator: TurnOrchestrator;
  localTasks: LocalTaskProvider;
  storage: IStorage;
  apiToken?: string;
};

export async function registerRoutes(app: Express, services: RouteServices): Promise<Server> {
  const { orchestrator, localTasks, storage } = services;

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post(
    "/api/chat",
    rateLimit({
      windowMs: RATE_LIMIT_CONSTANTS.CHAT_WINDOW_MS,
      maxRequests: RATE_LIMIT_CONSTANTS.CHAT_MAX_REQUESTS,
    }),
    requireApiToken(services.apiToken),
    validate({ body: chatRequestSchema }),
    async (req, res) => {
      try {
        const { message } = chatRequestSchema.parse(req.body);
        const result = await orchestrator.handle(message);
        res.json({
          reply: result.reply,
          used_tools: result.toolsUsed,
          retrieved_doc_ids: result.retrievedIds,
        });
      } catch (error) {
        handleRouteError(res, error, "Chat", { userFacing: true });
      }
    },
  );

  app.get("/api/todos", async (req, res) => {
    try {
      const { status } = parseQuery(todosQuerySchema, req);
      res.json(await localTasks.list(status));
    } catch (error) {
      handleRouteError(res, error, "Todos");
    }
  });

  app.get("/api/turns", async (req, res) => {
    try {
      const { limit } = parseQuery(turnsQuerySchema, req);
      res.json(await storage.listTurnRecords(limit));
    } catch (error) {
      handleRouteError(res, error, "Turns");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
