import type { PromptTurn } from "@domain/conversation/ports";

export const SYSTEM_PREAMBLE =
  "You are a helpful, friendly AI assistant. Answer concisely and accurately.";

function roleLabel(role: string): "User" | "Assistant" {
  return role === "user" ? "User" : "Assistant";
}

/**
 * Renders the completion prompt: preamble, one "<Label>: <content>" line per
 * history turn in the given order, then the new message and the
 * "Assistant:" generation cue.
 *
 * History depth is bounded by the caller; message bodies are never truncated.
 */
export function buildPrompt(
  history: readonly PromptTurn[],
  newMessage: string
): string {
  let prompt = `${SYSTEM_PREAMBLE}\n\n`;

  for (const turn of history) {
    prompt += `${roleLabel(turn.role)}: ${turn.content}\n`;
  }

  return `${prompt}User: ${newMessage}\nAssistant:`;
}
