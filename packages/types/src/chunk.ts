export type ChunkKind = "content" | "summary";

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  index: number;
  kind: ChunkKind;
  embedding: number[] | null;
  createdAt: Date;
}

export interface ChunkResult {
  text: string;
  index: number;
  charCount: number;
}

export interface ChunkingConfig {
  maxChars: number;
}

export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  documentTitle: string;
  text: string;
  index: number;
  kind: ChunkKind;
  score: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type EmbeddingInputType = "document" | "query";
