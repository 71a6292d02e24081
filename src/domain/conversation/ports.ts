/**
 * Conversation history port.
 *
 * Persistence is best-effort for the chat pipeline, so no operation here
 * rejects: each one resolves to a result and callers decide whether a
 * failure matters. `configured` is false for the null adapter used when no
 * database is set up.
 */
import type { StoreUnavailableError } from "@domain/errors";
import type { Result } from "@domain/result";

/** Roles the chat pipeline writes. */
export type TurnRole = "user" | "assistant";

/** Roles the schema admits; seeded or imported rows may carry "system". */
export const STORED_ROLES = ["user", "assistant", "system"] as const;

export type StoredRole = (typeof STORED_ROLES)[number];

export interface Turn {
  role: StoredRole;
  content: string;
  createdAt: Date;
}

/** The part of a turn that ends up in a prompt. */
export interface PromptTurn {
  role: string;
  content: string;
}

export type StoreResult<T> = Result<T, StoreUnavailableError>;

export interface HistoryStore {
  readonly configured: boolean;

  ensureConversation(conversationId: string): Promise<StoreResult<void>>;

  /** Up to `limit` most recent turns, oldest first. */
  loadRecent(conversationId: string, limit: number): Promise<StoreResult<Turn[]>>;

  appendTurn(
    conversationId: string,
    role: TurnRole,
    content: string
  ): Promise<StoreResult<Turn>>;

  /** Every turn of the conversation, oldest first. */
  listTurns(conversationId: string): Promise<StoreResult<Turn[]>>;

  ping(): Promise<StoreResult<void>>;
}
