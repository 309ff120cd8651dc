import { pgTable, text, timestamp, integer, pgEnum, vector, index } from "drizzle-orm/pg-core";
import { documents, EMBEDDING_DIMENSIONS } from "./documents.js";

export const chunkKindEnum = pgEnum("chunk_kind", ["content", "summary"]);

export const chunks = pgTable(
  "chunks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    text: text("text").notNull(),
    index: integer("index").notNull(),
    kind: chunkKindEnum("kind").notNull().default("content"),
    // null when the embedding call failed; the chunk stays searchable by text
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index("idx_chunks_document").on(table.documentId, table.index),
    embeddingIdx: index("idx_chunks_embedding").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);

export type ChunkRow = typeof chunks.$inferSelect;
export type NewChunkRow = typeof chunks.$inferInsert;
