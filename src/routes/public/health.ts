import type { HealthUseCase } from "@app/health/HealthUseCase";
import { createHealthController } from "@interfaces/http/HealthController";
import { Router } from "express";

export function createHealthRouter(health: HealthUseCase): Router {
  const router = Router();

  router.get("/", createHealthController(health));

  return router;
}
