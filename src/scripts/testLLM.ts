// Sends one assembled prompt to the configured backend and prints the answer.
// Usage: npm run llm:test -- "What is the capital of France?"
import { config } from "@config/index";
import { buildPrompt } from "@domain/conversation/promptBuilder";
import { OllamaAdapter } from "@infra/llm/OllamaAdapter";
import { describeError, logger } from "@infra/logging/Logger";

async function run(): Promise<void> {
  const message = process.argv[2] ?? "What animal jumps over the lazy dog?";

  const llm = new OllamaAdapter({
    host: config.ollama.host,
    model: config.ollama.model,
    timeoutMs: config.ollama.timeoutMs,
    probeTimeoutMs: config.ollama.probeTimeoutMs,
    pullTimeoutMs: config.ollama.pullTimeoutMs,
    logger,
  });

  try {
    const answer = await llm.generate(buildPrompt([], message));
    console.log("=== Backend response ===");
    console.log("model:", llm.model);
    console.log("answer:", answer);
  } catch (err: unknown) {
    console.error("LLM test error:", describeError(err).message);
    process.exitCode = 2;
  }
}

void run();
