import { desc, eq, ilike, inArray, isNotNull, sql, cosineDistance } from "drizzle-orm";
import { documents, chunks, getSchemaSql, closeDbClient } from "@quire/db";
import type { DbClient, DocumentRow } from "@quire/db";
import type { Chunk, ScoredChunk, StoredDocument } from "@quire/types";
import { StoreError, toAppError } from "@quire/errors";
import type { IDocumentRepository } from "./document-repository.interface.js";

/** Escape `%`, `_` and `\` so user text matches literally inside ILIKE. */
export function escapeLikePattern(pattern: string): string {
  return pattern.replace(/[\\%_]/g, "\\$&");
}

export function toStoredDocument(row: DocumentRow): StoredDocument {
  return {
    id: row.id,
    title: row.title,
    content: row.content,
    summary: row.summary,
    keyPoints: row.keyPoints,
    questions: row.questions,
    answers: row.answers,
    topics: row.topics,
    qAndA: row.qAndA,
    bulletPoints: row.bulletPoints,
    mindMap: row.mindMap,
    notebook: row.notebook,
    metadata: row.metadata,
    tables: row.tables,
    figures: row.figures,
    summaryEmbedding: row.summaryEmbedding,
    qualityScore: row.qualityScore,
    isProcessed: row.isProcessed,
    processingError: row.processingError,
    sourcePath: row.sourcePath,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function storeFailure(operation: string) {
  return (message: string, cause: unknown) =>
    new StoreError(`${operation} failed: ${message}`, { cause, details: { operation } });
}

/**
 * PostgreSQL + pgvector repository on Drizzle ORM.
 */
export class PgDocumentRepository implements IDocumentRepository {
  readonly supportsVectorSearch = true;

  constructor(
    private readonly db: DbClient,
    private readonly dimensions?: number,
  ) {}

  async replaceDocument(document: StoredDocument, chunkRows: Chunk[]): Promise<void> {
    const { id: _id, createdAt: _createdAt, ...updatable } = document;
    try {
      await this.db.transaction(async (tx) => {
        await tx
          .insert(documents)
          .values(document)
          .onConflictDoUpdate({
            target: documents.id,
            set: { ...updatable, updatedAt: new Date() },
          });

        await tx.delete(chunks).where(eq(chunks.documentId, document.id));

        if (chunkRows.length > 0) {
          await tx.insert(chunks).values(chunkRows);
        }
      });
    } catch (err) {
      throw toAppError(err, storeFailure("replaceDocument"));
    }
  }

  async listDocuments(names?: string[]): Promise<StoredDocument[]> {
    try {
      const query = this.db.select().from(documents);
      const rows =
        names && names.length > 0
          ? await query.where(inArray(documents.title, names)).orderBy(desc(documents.createdAt))
          : await query.orderBy(desc(documents.createdAt));
      return rows.map(toStoredDocument);
    } catch (err) {
      throw toAppError(err, storeFailure("listDocuments"));
    }
  }

  async similaritySearch(vector: number[], k: number): Promise<ScoredChunk[]> {
    const similarity = sql<number>`1 - (${cosineDistance(chunks.embedding, vector)})`;
    try {
      const rows = await this.db
        .select({
          chunkId: chunks.id,
          documentId: chunks.documentId,
          documentTitle: documents.title,
          text: chunks.text,
          index: chunks.index,
          kind: chunks.kind,
          score: similarity,
        })
        .from(chunks)
        .innerJoin(documents, eq(chunks.documentId, documents.id))
        .where(isNotNull(chunks.embedding))
        .orderBy(desc(similarity))
        .limit(k);

      return rows.map((row) => ({ ...row, score: Number(row.score) }));
    } catch (err) {
      throw toAppError(err, storeFailure("similaritySearch"));
    }
  }

  async textSearch(pattern: string, limit: number): Promise<StoredDocument[]> {
    try {
      const rows = await this.db
        .select()
        .from(documents)
        .where(ilike(documents.content, `%${escapeLikePattern(pattern)}%`))
        .orderBy(desc(documents.createdAt))
        .limit(limit);
      return rows.map(toStoredDocument);
    } catch (err) {
      throw toAppError(err, storeFailure("textSearch"));
    }
  }

  async ensureSchema(): Promise<void> {
    try {
      await this.db.$client.unsafe(getSchemaSql(this.dimensions)).simple();
    } catch (err) {
      throw toAppError(err, storeFailure("ensureSchema"));
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await closeDbClient(this.db);
  }
}
