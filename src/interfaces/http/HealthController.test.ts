import { HealthUseCase } from "@app/health/HealthUseCase";
import { describe, expect, it, vi } from "vitest";

import {
  createRecordingLogger,
  FakeInference,
  InMemoryHistoryStore,
} from "../../test/fakes";
import { createHealthController } from "./HealthController";

describe("healthController", () => {
  it("reports every dependency in the wire format", async () => {
    const store = new InMemoryHistoryStore();
    const llm = new FakeInference();
    const health = new HealthUseCase({
      store,
      llm,
      logger: createRecordingLogger(),
      probeTimeoutMs: 100,
    });
    const res = { json: vi.fn() };

    await createHealthController(health)({}, res);

    expect(res.json).toHaveBeenCalledWith({
      status: "healthy",
      model: "tinyllama",
      backend_status: "healthy",
      store_status: "healthy",
      model_available: true,
    });
  });

  it("stays healthy at the top level when dependencies are down", async () => {
    const store = new InMemoryHistoryStore();
    store.down = true;
    const llm = new FakeInference();
    llm.models = new Error("connect ECONNREFUSED");
    const health = new HealthUseCase({
      store,
      llm,
      logger: createRecordingLogger(),
      probeTimeoutMs: 100,
    });
    const res = { json: vi.fn() };

    await createHealthController(health)({}, res);

    expect(res.json).toHaveBeenCalledWith({
      status: "healthy",
      model: "tinyllama",
      backend_status: "unreachable",
      store_status: "unhealthy",
      model_available: false,
    });
  });
});
