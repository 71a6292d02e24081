import type { HistoryStore, Turn } from "@domain/conversation/ports";

/**
 * Explicit history lookup. Unlike the chat path this one fails loudly: an
 * unreachable store raises StoreUnavailableError instead of returning an
 * empty list, which would read as "no messages yet".
 */
export class HistoryUseCase {
  constructor(private readonly store: HistoryStore) {}

  async list(conversationId: string): Promise<Turn[]> {
    const result = await this.store.listTurns(conversationId);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }
}
