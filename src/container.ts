/**
 * Composition root: builds the pool, adapters and use cases from config and
 * wires them together. Nothing below this file reads config or creates
 * connections on its own.
 */
import { ChatUseCase } from "@app/chat/ChatUseCase";
import { HealthUseCase } from "@app/health/HealthUseCase";
import { HistoryUseCase } from "@app/history/HistoryUseCase";
import type { AppConfig } from "@config/index";
import type { HistoryStore } from "@domain/conversation/ports";
import type { InferencePort } from "@domain/llm/ports";
import { createPool, toSqlClient } from "@infra/database/db";
import { NullHistoryRepository } from "@infra/database/NullHistoryRepository";
import { PostgresHistoryRepository } from "@infra/database/PostgresHistoryRepository";
import { OllamaAdapter } from "@infra/llm/OllamaAdapter";
import type { LoggerPort } from "@infra/logging/Logger";
import type { Pool } from "pg";

export interface Container {
  pool: Pool | null;
  store: HistoryStore;
  llm: InferencePort;
  chat: ChatUseCase;
  history: HistoryUseCase;
  health: HealthUseCase;
  dispose(): Promise<void>;
}

export function buildContainer(config: AppConfig, logger: LoggerPort): Container {
  const pool = config.db.url ? createPool(config.db, logger) : null;

  const store: HistoryStore = pool
    ? new PostgresHistoryRepository(toSqlClient(pool), logger)
    : new NullHistoryRepository();

  const llm = new OllamaAdapter({
    host: config.ollama.host,
    model: config.ollama.model,
    timeoutMs: config.ollama.timeoutMs,
    probeTimeoutMs: config.ollama.probeTimeoutMs,
    pullTimeoutMs: config.ollama.pullTimeoutMs,
    logger,
  });

  return {
    pool,
    store,
    llm,
    chat: new ChatUseCase({
      store,
      llm,
      logger,
      historyLimit: config.chat.historyLimit,
    }),
    history: new HistoryUseCase(store),
    health: new HealthUseCase({
      store,
      llm,
      logger,
      probeTimeoutMs: config.health.probeTimeoutMs,
    }),
    async dispose() {
      if (pool) {
        await pool.end();
      }
    },
  };
}
