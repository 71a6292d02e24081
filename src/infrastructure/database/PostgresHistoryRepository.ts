/**
 * Postgres-backed implementation of the HistoryStore port.
 *
 * Stores conversations and their messages in the `conversations` and
 * `messages` tables (db/init.sql). Every statement runs on its own pooled
 * connection, so concurrent requests never queue behind one handle.
 *
 * Failures are never thrown: each is logged and returned as a
 * StoreUnavailableError so callers choose whether to degrade or surface it.
 */
import {
  STORED_ROLES,
  type HistoryStore,
  type StoreResult,
  type Turn,
  type TurnRole,
} from "@domain/conversation/ports";
import { StoreUnavailableError } from "@domain/errors";
import { fail, ok } from "@domain/result";
import type { SqlClient } from "@infra/database/db";
import { describeError, type LoggerPort } from "@infra/logging/Logger";
import { z } from "zod";

const TurnRowSchema = z.object({
  role: z.enum(STORED_ROLES),
  content: z.string(),
  created_at: z.coerce.date(),
});

type TurnRow = z.infer<typeof TurnRowSchema>;

function toTurn(row: TurnRow): Turn {
  return {
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
  };
}

function toTurns(rows: unknown[]): Turn[] {
  return rows.map((row) => toTurn(TurnRowSchema.parse(row)));
}

export class PostgresHistoryRepository implements HistoryStore {
  readonly configured = true;

  constructor(
    private readonly sql: SqlClient,
    private readonly logger: LoggerPort
  ) {}

  async ensureConversation(
    conversationId: string
  ): Promise<StoreResult<void>> {
    return this.run("ensureConversation", conversationId, async () => {
      await this.sql.query(
        `INSERT INTO conversations (id) VALUES ($1) ON CONFLICT DO NOTHING`,
        [conversationId]
      );
    });
  }

  async loadRecent(
    conversationId: string,
    limit: number
  ): Promise<StoreResult<Turn[]>> {
    return this.run("loadRecent", conversationId, async () => {
      const result = await this.sql.query(
        `
        SELECT role, content, created_at
        FROM messages
        WHERE conversation_id = $1
        ORDER BY created_at DESC
        LIMIT $2;
        `,
        [conversationId, limit]
      );

      return toTurns(result.rows).reverse();
    });
  }

  async appendTurn(
    conversationId: string,
    role: TurnRole,
    content: string
  ): Promise<StoreResult<Turn>> {
    return this.run("appendTurn", conversationId, async () => {
      const result = await this.sql.query(
        `
        INSERT INTO messages (conversation_id, role, content)
        VALUES ($1, $2, $3)
        RETURNING role, content, created_at;
        `,
        [conversationId, role, content]
      );

      const [row] = toTurns(result.rows);
      if (!row) {
        throw new Error("Insert returned no row");
      }
      return row;
    });
  }

  async listTurns(conversationId: string): Promise<StoreResult<Turn[]>> {
    return this.run("listTurns", conversationId, async () => {
      const result = await this.sql.query(
        `
        SELECT role, content, created_at
        FROM messages
        WHERE conversation_id = $1
        ORDER BY created_at ASC;
        `,
        [conversationId]
      );

      return toTurns(result.rows);
    });
  }

  async ping(): Promise<StoreResult<void>> {
    return this.run("ping", null, async () => {
      await this.sql.query("SELECT 1");
    });
  }

  private async run<T>(
    operation: string,
    conversationId: string | null,
    fn: () => Promise<T>
  ): Promise<StoreResult<T>> {
    try {
      return ok(await fn());
    } catch (error: unknown) {
      const caught = describeError(error);

      this.logger.event("STORE_OPERATION_FAILED", {
        operation,
        conversationId,
        message: caught.message,
        name: caught.name,
      });

      return fail(
        new StoreUnavailableError(
          "Database not available",
          { operation },
          error
        )
      );
    }
  }
}
