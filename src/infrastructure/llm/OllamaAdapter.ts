/**
 * Ollama integration layer.
 *
 * Talks to Ollama through its OpenAI-compatible API using the openai SDK:
 * - /v1/completions for non-streaming text generation with fixed decoding
 *   parameters
 * - /v1/models for the health probe
 * - /api/pull (native endpoint) to pre-warm the configured model at startup
 *
 * SDK retries are disabled; a failed generation fails the request. Errors
 * are classified into BackendError (the backend answered with a failure
 * status) and BackendUnavailableError (no usable answer at all).
 */
import {
  BackendError,
  BackendUnavailableError,
  type AppError,
} from "@domain/errors";
import {
  DEFAULT_GENERATION_OPTIONS,
  type GenerationOptions,
  type InferencePort,
} from "@domain/llm/ports";
import {
  describeError,
  logger as defaultLogger,
  type LoggerPort,
} from "@infra/logging/Logger";
import OpenAI, { APIConnectionError, APIError } from "openai";
import { z } from "zod";

export interface OllamaAdapterOptions {
  host: string;
  model: string;
  timeoutMs: number;
  probeTimeoutMs: number;
  pullTimeoutMs: number;
  generation?: GenerationOptions;
  logger?: LoggerPort;
  /** Replaces the global fetch; tests use it to stand in for the backend. */
  fetch?: typeof fetch;
}

const PullResponseSchema = z.object({
  status: z.string(),
});

export function classifyBackendError(error: unknown): AppError {
  if (error instanceof BackendError || error instanceof BackendUnavailableError) {
    return error;
  }

  // APIConnectionError extends APIError with no status, so it goes first.
  if (error instanceof APIConnectionError) {
    return new BackendUnavailableError(error);
  }

  if (error instanceof APIError) {
    return new BackendError(error.status, error);
  }

  return new BackendUnavailableError(error);
}

export class OllamaAdapter implements InferencePort {
  readonly model: string;

  private readonly client: OpenAI;
  private readonly host: string;
  private readonly generation: GenerationOptions;
  private readonly logger: LoggerPort;

  constructor(private readonly options: OllamaAdapterOptions) {
    this.model = options.model;
    this.host = options.host;
    this.generation = options.generation ?? DEFAULT_GENERATION_OPTIONS;
    this.logger = options.logger ?? defaultLogger;
    this.client = new OpenAI({
      apiKey: "ollama",
      baseURL: `${options.host}/v1`,
      timeout: options.timeoutMs,
      maxRetries: 0,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  async generate(prompt: string): Promise<string> {
    const startedAt = Date.now();

    try {
      const completion = await this.client.completions.create(
        {
          model: this.model,
          prompt,
          stream: false,
          temperature: this.generation.temperature,
          top_p: this.generation.topP,
          max_tokens: this.generation.maxTokens,
        },
        { timeout: this.options.timeoutMs }
      );

      const text = (completion.choices[0]?.text ?? "").trim();

      this.logger.event("LLM_SUCCESS", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        promptLength: prompt.length,
        responseLength: text.length,
      });

      return text;
    } catch (error: unknown) {
      const classified = classifyBackendError(error);
      const caught = describeError(error);

      this.logger.event("LLM_FAILURE", {
        model: this.model,
        durationMs: Date.now() - startedAt,
        classifiedAs: classified.type,
        message: caught.message,
        name: caught.name,
      });

      throw classified;
    }
  }

  async listModels(): Promise<string[]> {
    try {
      const page = await this.client.models.list({
        timeout: this.options.probeTimeoutMs,
      });
      return page.data.map((model) => model.id);
    } catch (error: unknown) {
      throw classifyBackendError(error);
    }
  }

  async pullModel(): Promise<string> {
    try {
      const response: unknown = await this.client.post(`${this.host}/api/pull`, {
        body: { model: this.model, stream: false },
        timeout: this.options.pullTimeoutMs,
      });

      const parsed = PullResponseSchema.safeParse(response);
      return parsed.success ? parsed.data.status : "unknown";
    } catch (error: unknown) {
      throw classifyBackendError(error);
    }
  }
}
