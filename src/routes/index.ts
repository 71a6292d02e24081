/**
 * Express route registration.
 *
 * - GET  /api/health: composite backend/store status
 * - POST /api/chat: one conversational turn
 * - GET  /api/conversations/:conversationId/messages: stored history
 */
import type { ChatUseCase } from "@app/chat/ChatUseCase";
import type { HealthUseCase } from "@app/health/HealthUseCase";
import type { HistoryUseCase } from "@app/history/HistoryUseCase";
import { createChatRouter } from "@routes/public/chat";
import { createConversationsRouter } from "@routes/public/conversations";
import { createHealthRouter } from "@routes/public/health";
import type { Express } from "express";

export interface RouteDeps {
  chat: ChatUseCase;
  history: HistoryUseCase;
  health: HealthUseCase;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.use("/api/health", createHealthRouter(deps.health));
  app.use("/api/chat", createChatRouter(deps.chat));
  app.use("/api/conversations", createConversationsRouter(deps.history));
}
