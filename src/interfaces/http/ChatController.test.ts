import { ChatUseCase } from "@app/chat/ChatUseCase";
import { ValidationError } from "@domain/errors";
import { describe, expect, it, vi } from "vitest";

import {
  createRecordingLogger,
  FakeInference,
  InMemoryHistoryStore,
} from "../../test/fakes";
import { createChatController } from "./ChatController";

const ID = "0d9c8b7a-6f5e-4d3c-9b2a-1f0e9d8c7b6a";

function setup() {
  const store = new InMemoryHistoryStore();
  const llm = new FakeInference();
  const chat = new ChatUseCase({
    store,
    llm,
    logger: createRecordingLogger(),
    historyLimit: 10,
  });
  const res = { json: vi.fn() };
  return { store, llm, res, controller: createChatController(chat) };
}

describe("chatController", () => {
  it("answers in the snake_case wire format", async () => {
    const { controller, res } = setup();

    await controller({ body: { message: "hi", conversation_id: ID } }, res);

    expect(res.json).toHaveBeenCalledWith({
      response: "Hello from the backend",
      conversation_id: ID,
      model: "tinyllama",
    });
  });

  it("accepts a null conversation id as absent", async () => {
    const { controller, res } = setup();

    await controller({ body: { message: "hi", conversation_id: null } }, res);

    const [body] = res.json.mock.calls[0] ?? [];
    expect(body).toMatchObject({ response: "Hello from the backend" });
  });

  it("rejects a blank message before calling the backend", async () => {
    const { controller, res, llm } = setup();

    await expect(
      controller({ body: { message: "   " } }, res)
    ).rejects.toBeInstanceOf(ValidationError);
    expect(llm.prompts).toEqual([]);
    expect(res.json).not.toHaveBeenCalled();
  });

  it("rejects a missing message", async () => {
    const { controller, res } = setup();

    await expect(controller({ body: {} }, res)).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("rejects a malformed conversation id before touching the store", async () => {
    const { controller, res, store, llm } = setup();

    await expect(
      controller({ body: { message: "hi", conversation_id: "not-a-uuid" } }, res)
    ).rejects.toBeInstanceOf(ValidationError);
    expect(store.conversations.size).toBe(0);
    expect(llm.prompts).toEqual([]);
  });
});
