import type { EmbeddingInputType, EmbeddingResult } from "@quire/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Defaults to the "document" input type. */
  embed(text: string, inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  batchEmbed(texts: string[], inputType?: EmbeddingInputType): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
