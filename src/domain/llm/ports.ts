/**
 * Domain port for the inference backend.
 *
 * generate() rejects with BackendError when the backend answers with a
 * failure status and with BackendUnavailableError when it cannot be reached
 * or times out. listModels() and pullModel() classify failures the same way.
 */
export interface GenerationOptions {
  temperature: number;
  topP: number;
  maxTokens: number;
}

export const DEFAULT_GENERATION_OPTIONS = {
  temperature: 0.7,
  topP: 0.9,
  maxTokens: 512,
} as const satisfies GenerationOptions;

export interface InferencePort {
  readonly model: string;

  generate(prompt: string): Promise<string>;

  /** Identifiers of the models the backend currently serves. */
  listModels(): Promise<string[]>;

  /** Downloads (or confirms) the configured model so the first request is fast. */
  pullModel(): Promise<string>;
}
