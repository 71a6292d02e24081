import type { LoggerPort } from "@infra/logging/Logger";
import { createErrorHandler } from "@middleware/errorHandler";
import { registerRoutes, type RouteDeps } from "@routes/index";
import cors from "cors";
import express, { type Express } from "express";

export interface HttpAppOptions extends RouteDeps {
  corsOrigin: string;
  logger: LoggerPort;
}

export function createHttpApp(options: HttpAppOptions): Express {
  const app = express();

  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json());

  registerRoutes(app, options);

  app.use(createErrorHandler(options.logger));

  return app;
}
