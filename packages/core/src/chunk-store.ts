import { randomUUID } from "node:crypto";
import { DEFAULT_CHUNKING, type IChunker } from "@quire/chunker";
import type { IEmbeddingProvider } from "@quire/embeddings";
import { StoreError, errorMessage, toAppError } from "@quire/errors";
import { createChildLogger, type Logger } from "@quire/logger";
import type { IDocumentRepository } from "@quire/store";
import type {
  Chunk,
  ChunkingConfig,
  DocumentStats,
  NotebookArtifact,
  StoredDocument,
} from "@quire/types";

export const RECENT_DOCUMENTS = 5;
/** Texts per embedding request. */
export const EMBED_BATCH_SIZE = 96;

export interface ChunkStoreDependencies {
  repository: IDocumentRepository;
  chunker: IChunker;
  /** Without one every chunk is stored with a null embedding. */
  embeddings: IEmbeddingProvider | null;
  logger: Logger;
  chunking?: ChunkingConfig;
  /** Expected vector length; defaults to the provider's. */
  dimensions?: number;
}

export interface PutOptions {
  /** Reusing an id supersedes that document and all of its chunks. */
  documentId?: string;
}

/**
 * Persists artifacts as a document row plus chunk rows. Content is chunked in
 * full, one extra chunk carries the summary, and chunks are embedded in
 * batches; when a batch fails its chunks are retried one at a time, so one bad
 * chunk only costs its own vector.
 */
export class ChunkStore {
  private readonly logger: Logger;

  constructor(private readonly deps: ChunkStoreDependencies) {
    this.logger = createChildLogger(deps.logger, { component: "chunk-store" });
  }

  async put(artifact: NotebookArtifact, options: PutOptions = {}): Promise<string> {
    const documentId = options.documentId ?? randomUUID();
    const { document, enrichment, display } = artifact;
    const now = new Date();

    const pieces = this.deps.chunker.chunk(
      document.content,
      this.deps.chunking ?? DEFAULT_CHUNKING,
    );
    const texts = [...pieces.map((piece) => piece.text), enrichment.summary];
    const vectors = await this.embedAll(texts, documentId);

    const chunks = texts.map((text, index): Chunk => ({
      id: randomUUID(),
      documentId,
      text,
      index,
      kind: index < pieces.length ? "content" : "summary",
      embedding: vectors[index] ?? null,
      createdAt: now,
    }));
    const embedded = chunks.filter((chunk) => chunk.embedding !== null).length;

    const stored: StoredDocument = {
      id: documentId,
      title: document.title,
      content: document.content,
      summary: enrichment.summary,
      keyPoints: [...enrichment.keyPoints],
      questions: [...enrichment.questions],
      answers: [...enrichment.answers],
      topics: [...enrichment.topics],
      qAndA: display.qa,
      bulletPoints: display.highlights,
      mindMap: artifact.mindMap,
      notebook: artifact.notebook,
      metadata: {
        ...document.metadata,
        model: enrichment.model,
        provenance: { ...enrichment.provenance },
        degraded: enrichment.degraded,
        ...(enrichment.degradedReason ? { degradedReason: enrichment.degradedReason } : {}),
        chunkCount: pieces.length,
        embeddedChunks: embedded,
      },
      tables: document.tables.map((table) => ({
        ...table,
        headers: [...table.headers],
        rows: table.rows.map((row) => [...row]),
      })),
      figures: document.figures.map((figure) => ({ ...figure })),
      summaryEmbedding: vectors[pieces.length] ?? null,
      qualityScore: enrichment.qualityScore,
      isProcessed: true,
      processingError:
        artifact.degradations.length > 0
          ? artifact.degradations.map((d) => `${d.stage}: ${d.message}`).join("; ")
          : null,
      sourcePath: document.sourcePath,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.deps.repository.replaceDocument(stored, chunks);
    } catch (err) {
      throw toAppError(err, (message, cause) => new StoreError(message, { cause }));
    }

    this.logger.info(
      { documentId, title: document.title, chunks: chunks.length, embedded },
      "Document stored",
    );
    return documentId;
  }

  /** Newest first; `names` filters by exact title. */
  async get(names?: string[]): Promise<StoredDocument[]> {
    try {
      return await this.deps.repository.listDocuments(names);
    } catch (err) {
      throw toAppError(err, (message, cause) => new StoreError(message, { cause }));
    }
  }

  async stats(): Promise<DocumentStats> {
    const documents = await this.get();
    return {
      totalDocuments: documents.length,
      processedDocuments: documents.filter((doc) => doc.isProcessed).length,
      totalContentLength: documents.reduce((sum, doc) => sum + doc.content.length, 0),
      recentDocuments: documents.slice(0, RECENT_DOCUMENTS).map((doc) => doc.title),
      documentNames: documents.map((doc) => doc.title),
    };
  }

  private async embedAll(texts: string[], documentId: string): Promise<(number[] | null)[]> {
    const provider = this.deps.embeddings;
    if (!provider) return texts.map(() => null);

    const expected = this.deps.dimensions ?? provider.dimensions;
    const vectors: (number[] | null)[] = [];

    // Batches run one after another; a failed batch is retried chunk by chunk
    // so a single bad chunk only costs its own vector.
    for (let start = 0; start < texts.length; start += EMBED_BATCH_SIZE) {
      const batch = texts.slice(start, start + EMBED_BATCH_SIZE);
      let embedded: (number[] | undefined)[];
      try {
        embedded = (await provider.batchEmbed(batch, "document")).embeddings;
      } catch (err) {
        this.logger.warn(
          { documentId, start, size: batch.length, err: errorMessage(err) },
          "Batch embedding failed, embedding chunks one at a time",
        );
        embedded = await this.embedEach(provider, batch, start, documentId);
      }
      batch.forEach((_, offset) => {
        vectors.push(this.checkDimensions(embedded[offset], expected, start + offset, documentId));
      });
    }
    return vectors;
  }

  private async embedEach(
    provider: IEmbeddingProvider,
    batch: string[],
    start: number,
    documentId: string,
  ): Promise<(number[] | undefined)[]> {
    const results: (number[] | undefined)[] = [];
    for (const [offset, text] of batch.entries()) {
      try {
        results.push((await provider.embed(text, "document")).embeddings[0]);
      } catch (err) {
        this.logger.warn(
          { documentId, index: start + offset, err: errorMessage(err) },
          "Chunk embedding failed, storing without a vector",
        );
        results.push(undefined);
      }
    }
    return results;
  }

  private checkDimensions(
    vector: number[] | undefined,
    expected: number,
    index: number,
    documentId: string,
  ): number[] | null {
    if (!vector) return null;
    if (vector.length !== expected) {
      this.logger.warn(
        { documentId, index, expected, actual: vector.length },
        "Chunk embedding has the wrong dimension, storing without a vector",
      );
      return null;
    }
    return vector;
  }
}
