/**
 * Chat HTTP controller for POST /api/chat.
 *
 * Validates the body with Zod, delegates to ChatUseCase and maps the result
 * to the snake_case wire format. Errors propagate to the global error
 * handler, which turns them into 400/502/503 responses.
 */
import type { ChatUseCase } from "@app/chat/ChatUseCase";
import { ValidationError } from "@domain/errors";
import {
  ChatRequestSchema,
  ChatResponseSchema,
  type ChatResponseBody,
} from "@interfaces/http/chat/schema";
import type { Request, Response } from "express";

export function createChatController(chat: ChatUseCase) {
  return async function chatController(
    req: Pick<Request, "body">,
    res: Pick<Response, "json">
  ): Promise<void> {
    const parsed = ChatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError("Invalid request", {
        issues: parsed.error.issues,
      });
    }

    const result = await chat.handle({
      message: parsed.data.message,
      conversationId: parsed.data.conversation_id ?? undefined,
    });

    const body: ChatResponseBody = ChatResponseSchema.parse({
      response: result.response,
      conversation_id: result.conversationId,
      model: result.model,
    });

    res.json(body);
  };
}
