/**
 * Startup diagnostics. MUST NOT throw: the server starts listening without
 * waiting for these, and a missing model or database only degrades service.
 *
 * - Pulls the configured model so the first chat request does not pay for
 *   the download.
 * - Pings the store and reports whether history will be persisted.
 */
import type { HistoryStore } from "@domain/conversation/ports";
import type { InferencePort } from "@domain/llm/ports";
import { describeError, type LoggerPort } from "@infra/logging/Logger";

export interface StartupCheckDeps {
  llm: InferencePort;
  store: HistoryStore;
  logger: LoggerPort;
}

export interface StartupReport {
  modelReady: boolean;
  storeReady: boolean;
}

export async function warmUpModel(
  llm: InferencePort,
  logger: LoggerPort
): Promise<boolean> {
  logger.log("info", `Pulling model '${llm.model}' from backend`);

  try {
    const status = await llm.pullModel();
    logger.log("info", `Model '${llm.model}' ready`, { status });
    return true;
  } catch (error: unknown) {
    logger.log(
      "warn",
      "Could not pull model (backend may not be up yet)",
      describeError(error)
    );
    return false;
  }
}

export async function verifyStore(
  store: HistoryStore,
  logger: LoggerPort
): Promise<boolean> {
  if (!store.configured) {
    logger.log("warn", "No database configured - running without persistence");
    return false;
  }

  const result = await store.ping();
  if (result.ok) {
    logger.log("info", "Database connection pool established");
    return true;
  }

  logger.log("warn", "Database unavailable - history will not persist", {
    reason: result.error.message,
  });
  return false;
}

export async function runStartupChecks(
  deps: StartupCheckDeps
): Promise<StartupReport> {
  const [modelReady, storeReady] = await Promise.all([
    warmUpModel(deps.llm, deps.logger),
    verifyStore(deps.store, deps.logger),
  ]);

  return { modelReady, storeReady };
}
