import type { HistoryUseCase } from "@app/history/HistoryUseCase";
import { ValidationError } from "@domain/errors";
import {
  HistoryParamsSchema,
  HistoryResponseSchema,
  type HistoryResponseBody,
} from "@interfaces/http/history/schema";
import type { Request, Response } from "express";

/** GET /api/conversations/:conversationId/messages */
export function createHistoryController(history: HistoryUseCase) {
  return async function historyController(
    req: Pick<Request, "params">,
    res: Pick<Response, "json">
  ): Promise<void> {
    const parsed = HistoryParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw new ValidationError("Invalid conversation id", {
        issues: parsed.error.issues,
      });
    }

    const turns = await history.list(parsed.data.conversationId);

    const body: HistoryResponseBody = HistoryResponseSchema.parse(
      turns.map((turn) => ({
        role: turn.role,
        content: turn.content,
        created_at: turn.createdAt.toISOString(),
      }))
    );

    res.json(body);
  };
}
