import type { ChunkResult, ChunkingConfig } from "@quire/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
