export interface CompletionOptions {
  /** Aborting cancels the in-flight request. */
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

export interface ICompletionClient {
  readonly name: string;
  readonly model: string;

  /** Resolves to the generated text; rejects with a CompletionError. */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  healthCheck(): Promise<boolean>;
}
