import { z } from "zod";
import type { EmbeddingInputType, EmbeddingResult } from "@quire/types";
import { EmbeddingError, errorMessage } from "@quire/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  fetch?: typeof fetch;
}

const bgeM3ResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().default(0),
});

/**
 * BGE-M3 self-hosted embedding provider.
 * Communicates with a BGE-M3 model server via HTTP.
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly dimensions: number;
  private baseUrl: string;
  private fetchFn: typeof fetch;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.fetchFn = config.fetch ?? fetch;
  }

  async embed(text: string, inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(
    texts: string[],
    inputType: EmbeddingInputType = "document",
  ): Promise<EmbeddingResult> {
    let body: unknown;
    try {
      const response = await this.fetchFn(`${this.baseUrl}/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, input_type: inputType, dimensions: this.dimensions }),
      });

      if (!response.ok) {
        throw new EmbeddingError(
          `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
          this.name,
        );
      }

      body = await response.json();
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`BGE-M3 request failed: ${errorMessage(err)}`, this.name, {
        cause: err,
      });
    }

    const parsed = bgeM3ResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new EmbeddingError("BGE-M3 returned an unexpected response", this.name, {
        details: { issues: parsed.error.issues },
      });
    }

    return {
      embeddings: parsed.data.embeddings,
      model: "bge-m3",
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
