import type { HistoryUseCase } from "@app/history/HistoryUseCase";
import { createHistoryController } from "@interfaces/http/HistoryController";
import { Router } from "express";

export function createConversationsRouter(history: HistoryUseCase): Router {
  const router = Router();

  router.get("/:conversationId/messages", createHistoryController(history));

  return router;
}
