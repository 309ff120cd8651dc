import { EMBEDDING_DIMENSIONS } from "./schema/documents.js";

/**
 * Idempotent DDL for the `documents` and `chunks` tables, matching the
 * Drizzle schema. Run once at startup (`ensureSchema`) or as a migration.
 */
export function getSchemaSql(dimensions: number = EMBEDDING_DIMENSIONS): string {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new RangeError(`dimensions must be a positive integer, got ${String(dimensions)}`);
  }

  return `
    CREATE EXTENSION IF NOT EXISTS vector;

    DO $$ BEGIN
      CREATE TYPE chunk_kind AS ENUM ('content', 'summary');
    EXCEPTION WHEN duplicate_object THEN NULL;
    END $$;

    CREATE TABLE IF NOT EXISTS documents (
      id text PRIMARY KEY,
      title text NOT NULL,
      content text NOT NULL,
      summary text NOT NULL DEFAULT '',
      key_points jsonb NOT NULL DEFAULT '[]',
      questions jsonb NOT NULL DEFAULT '[]',
      answers jsonb NOT NULL DEFAULT '[]',
      topics jsonb NOT NULL DEFAULT '[]',
      q_and_a text NOT NULL DEFAULT '',
      bullet_points text NOT NULL DEFAULT '',
      mind_map jsonb,
      notebook jsonb,
      metadata jsonb NOT NULL DEFAULT '{}',
      tables jsonb NOT NULL DEFAULT '[]',
      figures jsonb NOT NULL DEFAULT '[]',
      summary_embedding vector(${String(dimensions)}),
      quality_score real NOT NULL DEFAULT 0,
      is_processed boolean NOT NULL DEFAULT false,
      processing_error text,
      source_path text NOT NULL DEFAULT '',
      created_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS idx_documents_title ON documents (title);
    CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents (created_at);

    CREATE TABLE IF NOT EXISTS chunks (
      id text PRIMARY KEY,
      document_id text NOT NULL REFERENCES documents (id) ON DELETE CASCADE,
      text text NOT NULL,
      index integer NOT NULL,
      kind chunk_kind NOT NULL DEFAULT 'content',
      embedding vector(${String(dimensions)}),
      created_at timestamptz NOT NULL DEFAULT now()
    );

    CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks (document_id, index);
    CREATE INDEX IF NOT EXISTS idx_chunks_embedding ON chunks USING hnsw (embedding vector_cosine_ops);
  `;
}
