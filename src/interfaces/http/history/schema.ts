import { STORED_ROLES } from "@domain/conversation/ports";
import { z } from "zod";

export const HistoryParamsSchema = z.object({
  conversationId: z.string().uuid(),
});

export const HistoryResponseSchema = z.array(
  z.object({
    role: z.enum(STORED_ROLES),
    content: z.string(),
    created_at: z.string(),
  })
);

export type HistoryResponseBody = z.infer<typeof HistoryResponseSchema>;
