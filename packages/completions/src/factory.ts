import type { Logger } from "@quire/logger";
import type { ICompletionClient } from "./completion-client.interface.js";
import { CohereCompletionClient } from "./cohere-completion-client.js";

export interface CompletionFactoryConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
  temperature: number;
  logger: Logger;
}

/** No key, no client: callers fall back to non-AI behaviour. */
export function createCompletionClient(config: CompletionFactoryConfig): ICompletionClient | null {
  if (config.apiKey.length === 0) {
    config.logger.warn("COHERE_API_KEY not set, completion client disabled");
    return null;
  }
  return new CohereCompletionClient(config);
}
