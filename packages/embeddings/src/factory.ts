import type { Logger } from "@quire/logger";
import type { EmbeddingProviderType } from "@quire/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  /** Cohere key; empty disables the Cohere provider. */
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  bgeM3Url?: string;
  logger: Logger;
}

/**
 * The configured provider, or null when it lacks a key or endpoint. Without
 * one, chunks are stored unembedded and retrieval skips the vector tier.
 */
export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider | null {
  switch (config.provider) {
    case "cohere":
      if (config.apiKey.length === 0) {
        config.logger.warn("COHERE_API_KEY not set, embeddings disabled");
        return null;
      }
      return new CohereEmbeddingProvider({
        apiKey: config.apiKey,
        model: config.model,
        dimensions: config.dimensions,
        timeoutMs: config.timeoutMs,
      });
    case "bge-m3":
      if (!config.bgeM3Url) {
        config.logger.warn("BGE_M3_URL not set, embeddings disabled");
        return null;
      }
      return new BgeM3EmbeddingProvider({ baseUrl: config.bgeM3Url, dimensions: config.dimensions });
  }
}
