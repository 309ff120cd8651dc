import { CohereClient } from "cohere-ai";
import type { EmbeddingInputType, EmbeddingResult } from "@quire/types";
import { EmbeddingError, errorMessage } from "@quire/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereEmbedRequest {
  texts: string[];
  model: string;
  inputType: "search_document" | "search_query";
  embeddingTypes: "float"[];
  /** embed-v4.0 returns 1536 dimensions unless asked for fewer. */
  outputDimension?: number;
}

export interface CohereEmbedResponse {
  embeddings: { float?: number[][] };
  meta?: { billedUnits?: { inputTokens?: number } };
}

export interface CohereRequestOptions {
  timeoutInSeconds?: number;
  maxRetries?: number;
  abortSignal?: AbortSignal;
}

export type CohereEmbedFn = (
  request: CohereEmbedRequest,
  options?: CohereRequestOptions,
) => Promise<CohereEmbedResponse>;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  /** Replaces the SDK call; tests pass a fake here. */
  embed?: CohereEmbedFn;
}

const INPUT_TYPES: Record<EmbeddingInputType, CohereEmbedRequest["inputType"]> = {
  document: "search_document",
  query: "search_query",
};

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private embedFn: CohereEmbedFn;
  private model: string;
  private timeoutMs: number;

  constructor(config: CohereProviderConfig) {
    if (config.embed) {
      this.embedFn = config.embed;
    } else {
      const client = new CohereClient({ token: config.apiKey });
      this.embedFn = (request, options) => client.v2.embed(request, options);
    }
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(text: string, inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(
    texts: string[],
    inputType: EmbeddingInputType = "document",
  ): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    // Process in batches of BATCH_SIZE
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: CohereEmbedResponse;
      try {
        // Retries belong to the job queue, not to individual calls.
        response = await this.embedFn(
          {
            texts: batch,
            model: this.model,
            inputType: INPUT_TYPES[inputType],
            embeddingTypes: ["float"],
            outputDimension: this.dimensions,
          },
          { maxRetries: 0, timeoutInSeconds: Math.ceil(this.timeoutMs / 1000) },
        );
      } catch (err) {
        throw new EmbeddingError(`Cohere embed failed: ${errorMessage(err)}`, this.name, {
          cause: err,
        });
      }

      const vectors = response.embeddings.float;
      if (!vectors || vectors.length !== batch.length) {
        throw new EmbeddingError(
          `Cohere returned ${String(vectors?.length ?? 0)} embeddings for ${String(batch.length)} texts`,
          this.name,
        );
      }
      allEmbeddings.push(...vectors);

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
