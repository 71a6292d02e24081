import type {
  HistoryStore,
  StoreResult,
  Turn,
} from "@domain/conversation/ports";
import { StoreUnavailableError } from "@domain/errors";
import { fail } from "@domain/result";

/**
 * Stand-in store for deployments without a database. Every call reports the
 * store as unavailable, so the chat pipeline runs with empty history and the
 * history endpoint answers 503.
 */
export class NullHistoryRepository implements HistoryStore {
  readonly configured = false;

  private unavailable(): StoreResult<never> {
    return fail(new StoreUnavailableError("Database not configured"));
  }

  async ensureConversation(): Promise<StoreResult<void>> {
    return this.unavailable();
  }

  async loadRecent(): Promise<StoreResult<Turn[]>> {
    return this.unavailable();
  }

  async appendTurn(): Promise<StoreResult<Turn>> {
    return this.unavailable();
  }

  async listTurns(): Promise<StoreResult<Turn[]>> {
    return this.unavailable();
  }

  async ping(): Promise<StoreResult<void>> {
    return this.unavailable();
  }
}
