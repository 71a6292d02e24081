import type { HealthUseCase } from "@app/health/HealthUseCase";
import {
  HealthResponseSchema,
  type HealthResponseBody,
} from "@interfaces/http/health/schema";
import type { Response } from "express";

/** GET /api/health. Always 200; degraded dependencies show in the sub-statuses. */
export function createHealthController(health: HealthUseCase) {
  return async function healthController(
    _req: unknown,
    res: Pick<Response, "json">
  ): Promise<void> {
    const report = await health.check();

    const body: HealthResponseBody = HealthResponseSchema.parse({
      status: report.status,
      model: report.model,
      backend_status: report.backendStatus,
      store_status: report.storeStatus,
      model_available: report.modelAvailable,
    });

    res.json(body);
  };
}
