import { StoreUnavailableError } from "@domain/errors";
import { describe, expect, it } from "vitest";

import { createRecordingLogger } from "../../test/fakes";
import type { SqlClient } from "./db";
import { PostgresHistoryRepository } from "./PostgresHistoryRepository";

const ID = "5a1f3c2e-7b8d-4e9f-a0b1-c2d3e4f5a6b7";

type Step = unknown[] | Error;

/** Replays scripted results in order and records each statement. */
class ScriptedSql implements SqlClient {
  readonly calls: Array<{ text: string; values: unknown[] | undefined }> = [];

  constructor(private readonly steps: Step[]) {}

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push({ text: text.replace(/\s+/g, " ").trim(), values });
    const step = this.steps.shift() ?? [];
    if (step instanceof Error) {
      throw step;
    }
    return { rows: step };
  }
}

function row(role: string, content: string, createdAt: string) {
  return { role, content, created_at: new Date(createdAt) };
}

function setup(steps: Step[]) {
  const sql = new ScriptedSql(steps);
  const logger = createRecordingLogger();
  const repository = new PostgresHistoryRepository(sql, logger);
  return { sql, logger, repository };
}

describe("PostgresHistoryRepository", () => {
  it("registers a conversation idempotently", async () => {
    const { repository, sql } = setup([[]]);

    const result = await repository.ensureConversation(ID);

    expect(result.ok).toBe(true);
    expect(sql.calls).toEqual([
      {
        text: "INSERT INTO conversations (id) VALUES ($1) ON CONFLICT DO NOTHING",
        values: [ID],
      },
    ]);
  });

  it("fetches newest-first with the limit and returns oldest-first", async () => {
    const { repository, sql } = setup([
      [
        row("assistant", "hello", "2024-05-01T10:00:02Z"),
        row("user", "hi", "2024-05-01T10:00:01Z"),
      ],
    ]);

    const result = await repository.loadRecent(ID, 10);

    expect(sql.calls[0]?.text).toBe(
      "SELECT role, content, created_at FROM messages WHERE conversation_id = $1 ORDER BY created_at DESC LIMIT $2;"
    );
    expect(sql.calls[0]?.values).toEqual([ID, 10]);
    expect(result).toEqual({
      ok: true,
      value: [
        { role: "user", content: "hi", createdAt: new Date("2024-05-01T10:00:01Z") },
        {
          role: "assistant",
          content: "hello",
          createdAt: new Date("2024-05-01T10:00:02Z"),
        },
      ],
    });
  });

  it("appends a turn and returns the stored row", async () => {
    const { repository, sql } = setup([
      [row("user", "hi", "2024-05-01T10:00:01Z")],
    ]);

    const result = await repository.appendTurn(ID, "user", "hi");

    expect(sql.calls[0]?.text).toBe(
      "INSERT INTO messages (conversation_id, role, content) VALUES ($1, $2, $3) RETURNING role, content, created_at;"
    );
    expect(sql.calls[0]?.values).toEqual([ID, "user", "hi"]);
    expect(result).toEqual({
      ok: true,
      value: {
        role: "user",
        content: "hi",
        createdAt: new Date("2024-05-01T10:00:01Z"),
      },
    });
  });

  it("lists a conversation in ascending order as stored", async () => {
    const { repository, sql } = setup([
      [
        row("user", "hi", "2024-05-01T10:00:01Z"),
        row("assistant", "hello", "2024-05-01T10:00:02Z"),
        row("user", "how are you", "2024-05-01T10:00:03Z"),
      ],
    ]);

    const result = await repository.listTurns(ID);

    expect(sql.calls[0]?.text).toContain("ORDER BY created_at ASC");
    expect(result.ok && result.value.map((turn) => turn.content)).toEqual([
      "hi",
      "hello",
      "how are you",
    ]);
  });

  it("accepts timestamps returned as strings", async () => {
    const { repository } = setup([
      [{ role: "user", content: "hi", created_at: "2024-05-01T10:00:01.000Z" }],
    ]);

    const result = await repository.listTurns(ID);

    expect(result.ok && result.value[0]?.createdAt.toISOString()).toBe(
      "2024-05-01T10:00:01.000Z"
    );
  });

  it("pings with a trivial query", async () => {
    const { repository, sql } = setup([[{ "?column?": 1 }]]);

    expect((await repository.ping()).ok).toBe(true);
    expect(sql.calls).toEqual([{ text: "SELECT 1", values: undefined }]);
  });

  it("turns a query failure into StoreUnavailableError and logs it", async () => {
    const { repository, logger } = setup([new Error("connect ECONNREFUSED")]);

    const result = await repository.loadRecent(ID, 10);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StoreUnavailableError);
      expect(result.error.metadata).toEqual({ operation: "loadRecent" });
    }
    expect(logger.event).toHaveBeenCalledWith("STORE_OPERATION_FAILED", {
      operation: "loadRecent",
      conversationId: ID,
      message: "connect ECONNREFUSED",
      name: "Error",
    });
  });

  it("reads system rows the schema admits", async () => {
    const { repository } = setup([
      [
        row("system", "seeded greeting", "2024-05-01T10:00:00Z"),
        row("user", "hi", "2024-05-01T10:00:01Z"),
      ],
    ]);

    const result = await repository.listTurns(ID);

    expect(result).toEqual({
      ok: true,
      value: [
        {
          role: "system",
          content: "seeded greeting",
          createdAt: new Date("2024-05-01T10:00:00Z"),
        },
        { role: "user", content: "hi", createdAt: new Date("2024-05-01T10:00:01Z") },
      ],
    });
  });

  it("keeps a system row in the recent window", async () => {
    const { repository } = setup([
      [
        row("user", "hi", "2024-05-01T10:00:01Z"),
        row("system", "seeded greeting", "2024-05-01T10:00:00Z"),
      ],
    ]);

    const result = await repository.loadRecent(ID, 10);

    expect(result.ok && result.value.map((turn) => turn.role)).toEqual([
      "system",
      "user",
    ]);
  });

  it("treats a row without content as a store failure", async () => {
    const { repository } = setup([
      [{ role: "user", created_at: new Date("2024-05-01T10:00:01Z") }],
    ]);

    const result = await repository.listTurns(ID);

    expect(result.ok).toBe(false);
  });

  it("reports an insert that returns no row as a failure", async () => {
    const { repository } = setup([[]]);

    const result = await repository.appendTurn(ID, "assistant", "hello");

    expect(result.ok).toBe(false);
  });
});
