import {
  pgTable,
  text,
  timestamp,
  jsonb,
  real,
  boolean,
  vector,
  index,
} from "drizzle-orm/pg-core";
import type { FigureRef, MindMap, NotebookStructure, TableRef } from "@quire/types";

/** Width of every stored embedding column. */
export const EMBEDDING_DIMENSIONS = 1024;

/**
 * One row per enriched document. The full extracted content lives in
 * `content`; the enrichment fields sit beside it, and `summaryEmbedding`
 * is the document-level vector used to pre-filter lexical retrieval.
 */
export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    title: text("title").notNull(),
    content: text("content").notNull(),
    summary: text("summary").notNull().default(""),
    keyPoints: jsonb("key_points").notNull().$type<string[]>().default([]),
    questions: jsonb("questions").notNull().$type<string[]>().default([]),
    answers: jsonb("answers").notNull().$type<string[]>().default([]),
    topics: jsonb("topics").notNull().$type<string[]>().default([]),
    qAndA: text("q_and_a").notNull().default(""),
    bulletPoints: text("bullet_points").notNull().default(""),
    mindMap: jsonb("mind_map").$type<MindMap>(),
    notebook: jsonb("notebook").$type<NotebookStructure>(),
    metadata: jsonb("metadata").notNull().$type<Record<string, unknown>>().default({}),
    tables: jsonb("tables").notNull().$type<TableRef[]>().default([]),
    figures: jsonb("figures").notNull().$type<FigureRef[]>().default([]),
    summaryEmbedding: vector("summary_embedding", { dimensions: EMBEDDING_DIMENSIONS }),
    qualityScore: real("quality_score").notNull().default(0),
    isProcessed: boolean("is_processed").notNull().default(false),
    processingError: text("processing_error"),
    sourcePath: text("source_path").notNull().default(""),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    titleIdx: index("idx_documents_title").on(table.title),
    createdAtIdx: index("idx_documents_created_at").on(table.createdAt),
  }),
);

export type DocumentRow = typeof documents.$inferSelect;
export type NewDocumentRow = typeof documents.$inferInsert;
