import type { Chunk, ScoredChunk, StoredDocument } from "@quire/types";

/**
 * Relational store for enriched documents and their chunks.
 */
export interface IDocumentRepository {
  /** False when the backend has no vector index (similaritySearch returns []). */
  readonly supportsVectorSearch: boolean;

  /**
   * Upsert the document row and replace its whole chunk set in one atomic
   * step. An existing row keeps its `createdAt`.
   */
  replaceDocument(document: StoredDocument, chunks: Chunk[]): Promise<void>;

  /** Newest first. `names` filters by exact title; omitted or empty lists all. */
  listDocuments(names?: string[]): Promise<StoredDocument[]>;

  /** Chunks with an embedding, best cosine similarity first. */
  similaritySearch(vector: number[], k: number): Promise<ScoredChunk[]>;

  /** Case-insensitive substring match over document content, newest first. */
  textSearch(pattern: string, limit: number): Promise<StoredDocument[]>;

  ensureSchema(): Promise<void>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
