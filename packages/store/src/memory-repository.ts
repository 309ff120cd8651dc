import type { Chunk, ScoredChunk, StoredDocument } from "@quire/types";
import type { IDocumentRepository } from "./document-repository.interface.js";
import { cosineSimilarity } from "./cosine-similarity.js";

interface Entry {
  document: StoredDocument;
  chunks: Chunk[];
  /** Insertion order; breaks createdAt ties. */
  sequence: number;
}

/**
 * Process-local repository used when no DATABASE_URL is configured and in
 * tests. Values are cloned on the way in and out.
 */
export class InMemoryDocumentRepository implements IDocumentRepository {
  readonly supportsVectorSearch: boolean;
  private entries = new Map<string, Entry>();
  private sequence = 0;

  constructor(options: { supportsVectorSearch?: boolean } = {}) {
    this.supportsVectorSearch = options.supportsVectorSearch ?? true;
  }

  async replaceDocument(document: StoredDocument, chunks: Chunk[]): Promise<void> {
    const existing = this.entries.get(document.id);
    const stored = structuredClone(document);
    if (existing) {
      stored.createdAt = existing.document.createdAt;
    }
    this.entries.set(document.id, {
      document: stored,
      chunks: structuredClone(chunks),
      sequence: existing?.sequence ?? this.sequence++,
    });
  }

  async listDocuments(names?: string[]): Promise<StoredDocument[]> {
    const wanted = names && names.length > 0 ? new Set(names) : null;
    return this.newestFirst()
      .filter((entry) => wanted === null || wanted.has(entry.document.title))
      .map((entry) => structuredClone(entry.document));
  }

  async similaritySearch(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (!this.supportsVectorSearch) return [];

    const scored: ScoredChunk[] = [];
    for (const { document, chunks } of this.entries.values()) {
      for (const chunk of chunks) {
        if (chunk.embedding === null) continue;
        scored.push({
          chunkId: chunk.id,
          documentId: document.id,
          documentTitle: document.title,
          text: chunk.text,
          index: chunk.index,
          kind: chunk.kind,
          score: cosineSimilarity(vector, chunk.embedding),
        });
      }
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  async textSearch(pattern: string, limit: number): Promise<StoredDocument[]> {
    const needle = pattern.toLowerCase();
    return this.newestFirst()
      .filter((entry) => entry.document.content.toLowerCase().includes(needle))
      .slice(0, limit)
      .map((entry) => structuredClone(entry.document));
  }

  /** Chunks currently stored for a document, in index order. */
  async listChunks(documentId: string): Promise<Chunk[]> {
    const entry = this.entries.get(documentId);
    return entry ? structuredClone(entry.chunks).sort((a, b) => a.index - b.index) : [];
  }

  async ensureSchema(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private newestFirst(): Entry[] {
    return [...this.entries.values()].sort(
      (a, b) =>
        b.document.createdAt.getTime() - a.document.createdAt.getTime() || b.sequence - a.sequence,
    );
  }
}
