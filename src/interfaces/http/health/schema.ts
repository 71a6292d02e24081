import { z } from "zod";

export const HealthResponseSchema = z.object({
  status: z.literal("healthy"),
  model: z.string(),
  backend_status: z.enum(["healthy", "unhealthy", "unreachable"]),
  store_status: z.enum(["healthy", "unhealthy", "unavailable"]),
  model_available: z.boolean(),
});

export type HealthResponseBody = z.infer<typeof HealthResponseSchema>;
