/**
 * Chat orchestration use-case.
 *
 * Per request:
 *   resolve conversation id → load recent history (best-effort)
 *   → build prompt → generate (required) → persist both turns (best-effort)
 *   → return answer, conversation id and model.
 *
 * Store failures on this path are logged and ignored: the user still gets an
 * answer, the conversation only loses continuity. Backend failures end the
 * request before anything is persisted.
 */
import crypto from "crypto";

import type {
  HistoryStore,
  PromptTurn,
  StoreResult,
} from "@domain/conversation/ports";
import { buildPrompt } from "@domain/conversation/promptBuilder";
import type { InferencePort } from "@domain/llm/ports";
import type { LoggerPort } from "@infra/logging/Logger";

export interface ChatRequest {
  message: string;
  conversationId?: string | undefined;
}

export interface ChatResult {
  response: string;
  conversationId: string;
  model: string;
}

export interface ChatUseCaseDeps {
  store: HistoryStore;
  llm: InferencePort;
  logger: LoggerPort;
  historyLimit: number;
  newConversationId?: () => string;
}

export class ChatUseCase {
  private readonly newConversationId: () => string;

  constructor(private readonly deps: ChatUseCaseDeps) {
    this.newConversationId =
      deps.newConversationId ?? (() => crypto.randomUUID());
  }

  async handle(request: ChatRequest): Promise<ChatResult> {
    const conversationId = request.conversationId ?? this.newConversationId();

    const history = await this.loadHistory(conversationId);
    const prompt = buildPrompt(history, request.message);

    const answer = await this.deps.llm.generate(prompt);

    await this.persistExchange(conversationId, request.message, answer);

    this.deps.logger.event("CHAT_COMPLETED", {
      conversationId,
      historyCount: history.length,
      model: this.deps.llm.model,
    });

    return {
      response: answer,
      conversationId,
      model: this.deps.llm.model,
    };
  }

  private async loadHistory(conversationId: string): Promise<PromptTurn[]> {
    const registered = await this.deps.store.ensureConversation(conversationId);
    if (!registered.ok) {
      this.reportSkipped("HISTORY_LOAD_SKIPPED", conversationId, registered);
      return [];
    }

    const recent = await this.deps.store.loadRecent(
      conversationId,
      this.deps.historyLimit
    );
    if (!recent.ok) {
      this.reportSkipped("HISTORY_LOAD_SKIPPED", conversationId, recent);
      return [];
    }

    return recent.value;
  }

  // The two writes are independent: losing the user turn does not stop the
  // assistant turn from being stored, and neither failure reaches the caller.
  private async persistExchange(
    conversationId: string,
    message: string,
    answer: string
  ): Promise<void> {
    const userTurn = await this.deps.store.appendTurn(
      conversationId,
      "user",
      message
    );
    if (!userTurn.ok) {
      this.reportSkipped("TURN_PERSIST_FAILED", conversationId, userTurn);
    }

    const assistantTurn = await this.deps.store.appendTurn(
      conversationId,
      "assistant",
      answer
    );
    if (!assistantTurn.ok) {
      this.reportSkipped("TURN_PERSIST_FAILED", conversationId, assistantTurn);
    }
  }

  private reportSkipped(
    message: string,
    conversationId: string,
    result: Extract<StoreResult<unknown>, { ok: false }>
  ): void {
    this.deps.logger.log(this.deps.store.configured ? "warn" : "debug", message, {
      conversationId,
      reason: result.error.message,
    });
  }
}
