import { z } from "zod";

/**
 * Request/response DTOs for POST /api/chat.
 *
 * The message must contain something other than whitespace; it is passed to
 * the prompt unmodified. conversation_id is optional and, when present, must
 * be a UUID so a malformed id is rejected before any store or backend call.
 */
export const ChatRequestSchema = z.object({
  message: z
    .string()
    .refine((value) => value.trim().length > 0, "message must not be blank"),
  conversation_id: z.string().uuid().nullish(),
});

export const ChatResponseSchema = z.object({
  response: z.string(),
  conversation_id: z.string().uuid(),
  model: z.string(),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;
export type ChatResponseBody = z.infer<typeof ChatResponseSchema>;
