import type CircuitBreaker from "opossum";
import { CohereClient } from "cohere-ai";
import {
  CompletionError,
  createCircuitBreaker,
  errorMessage,
  isOpenCircuitError,
} from "@quire/errors";
import type { CircuitBreakerOptions } from "@quire/errors";
import type { Logger } from "@quire/logger";
import type { CompletionOptions, ICompletionClient } from "./completion-client.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_TEMPERATURE = 0.3;

export interface CohereChatRequest {
  model: string;
  messages: { role: "user"; content: string }[];
  temperature?: number;
  maxTokens?: number;
}

export interface CohereChatResponse {
  message: { content?: { type: string; text?: string }[] };
}

export interface CohereChatOptions {
  timeoutInSeconds?: number;
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

export type CohereChatFn = (
  request: CohereChatRequest,
  options?: CohereChatOptions,
) => Promise<CohereChatResponse>;

export interface CohereCompletionConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  temperature?: number;
  logger: Logger;
  breaker?: CircuitBreakerOptions;
  /** Replaces the SDK call; tests pass a fake here. */
  chat?: CohereChatFn;
}

/**
 * Cohere v2 chat behind a circuit breaker. SDK retries are disabled; a
 * failed call surfaces immediately as a CompletionError.
 */
export class CohereCompletionClient implements ICompletionClient {
  readonly name = "cohere";
  readonly model: string;
  private timeoutMs: number;
  private temperature: number;
  private breaker: CircuitBreaker<[CohereChatRequest, CohereChatOptions], CohereChatResponse>;

  constructor(config: CohereCompletionConfig) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;

    let chat: CohereChatFn;
    if (config.chat) {
      chat = config.chat;
    } else {
      const client = new CohereClient({ token: config.apiKey });
      chat = (request, options) => client.v2.chat(request, options);
    }

    this.breaker = createCircuitBreaker(
      "cohere-chat",
      (request: CohereChatRequest, options: CohereChatOptions) => chat(request, options),
      config.logger,
      { timeout: this.timeoutMs, ...config.breaker },
    );
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    if (options?.signal?.aborted) {
      throw new CompletionError("Completion aborted before it started", this.name);
    }

    let response: CohereChatResponse;
    try {
      response = await this.breaker.fire(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: options?.temperature ?? this.temperature,
          ...(options?.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
        },
        {
          maxRetries: 0,
          timeoutInSeconds: Math.ceil(this.timeoutMs / 1000),
          ...(options?.signal ? { abortSignal: options.signal } : {}),
        },
      );
    } catch (err) {
      if (isOpenCircuitError(err)) {
        throw new CompletionError("Completion circuit is open", this.name, { cause: err });
      }
      throw new CompletionError(`Cohere chat failed: ${errorMessage(err)}`, this.name, {
        cause: err,
      });
    }

    return (response.message.content ?? [])
      .map((item) => (item.type === "text" ? (item.text ?? "") : ""))
      .join("")
      .trim();
  }

  async healthCheck(): Promise<boolean> {
    if (this.breaker.opened) return false;
    try {
      await this.complete("Reply with OK.", { maxTokens: 5 });
      return true;
    } catch {
      return false;
    }
  }

  /** Stops the breaker's rolling statistics timer. */
  close(): void {
    this.breaker.shutdown();
  }
}
