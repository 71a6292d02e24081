/**
 * Composite health probe.
 *
 * Probes the inference backend and the store concurrently, each under its
 * own short timeout. A failing probe only changes its own sub-status; the
 * report itself is always produced and the top-level status stays
 * "healthy" because the service can still accept requests.
 */
import type { HistoryStore } from "@domain/conversation/ports";
import { BackendError } from "@domain/errors";
import type { InferencePort } from "@domain/llm/ports";
import { describeError, type LoggerPort } from "@infra/logging/Logger";
import { withTimeout } from "@utils/timeout";

export type BackendStatus = "healthy" | "unhealthy" | "unreachable";
export type StoreStatus = "healthy" | "unhealthy" | "unavailable";

export interface HealthReport {
  status: "healthy";
  model: string;
  backendStatus: BackendStatus;
  storeStatus: StoreStatus;
  modelAvailable: boolean;
}

export interface HealthUseCaseDeps {
  store: HistoryStore;
  llm: InferencePort;
  logger: LoggerPort;
  probeTimeoutMs: number;
}

export function isModelListed(model: string, available: string[]): boolean {
  return available.some(
    (name) => name === model || name === `${model}:latest`
  );
}

export class HealthUseCase {
  constructor(private readonly deps: HealthUseCaseDeps) {}

  async check(): Promise<HealthReport> {
    const [backend, storeStatus] = await Promise.all([
      this.probeBackend(),
      this.probeStore(),
    ]);

    return {
      status: "healthy",
      model: this.deps.llm.model,
      backendStatus: backend.status,
      storeStatus,
      modelAvailable: backend.modelAvailable,
    };
  }

  private async probeBackend(): Promise<{
    status: BackendStatus;
    modelAvailable: boolean;
  }> {
    try {
      const models = await withTimeout(
        this.deps.llm.listModels(),
        this.deps.probeTimeoutMs,
        "backend probe"
      );
      return {
        status: "healthy",
        modelAvailable: isModelListed(this.deps.llm.model, models),
      };
    } catch (error: unknown) {
      this.deps.logger.log("debug", "Backend probe failed", describeError(error));
      return {
        status: error instanceof BackendError ? "unhealthy" : "unreachable",
        modelAvailable: false,
      };
    }
  }

  private async probeStore(): Promise<StoreStatus> {
    if (!this.deps.store.configured) {
      return "unavailable";
    }

    try {
      const result = await withTimeout(
        this.deps.store.ping(),
        this.deps.probeTimeoutMs,
        "store probe"
      );
      return result.ok ? "healthy" : "unhealthy";
    } catch (error: unknown) {
      this.deps.logger.log("debug", "Store probe failed", describeError(error));
      return "unhealthy";
    }
  }
}
