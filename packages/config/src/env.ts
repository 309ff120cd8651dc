import { z } from "zod";
import type { AppConfig } from "@quire/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const ratio = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().min(0).max(1));

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((value) => value === "true");

/**
 * Zod schema for every environment variable the services read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql://",
      })
      .optional(),
    DATABASE_POOL_MAX: positiveInt("10"),

    // ---------- Redis / worker ----------
    REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
    WORKER_CONCURRENCY: positiveInt("2"),

    // ---------- Cohere ----------
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- Completions ----------
    COMPLETION_TIMEOUT_MS: positiveInt("60000"),
    COMPLETION_TEMPERATURE: z
      .string()
      .default("0.3")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),

    // ---------- Extraction ----------
    MIN_CONTENT_LENGTH: positiveInt("10"),
    DOCLING_PYTHON: z.string().min(1).default("python3"),
    DOCLING_SCRIPT: z.string().min(1).default("scripts/docling-extract.py"),

    // ---------- Enrichment ----------
    ENRICH_INPUT_MAX_CHARS: positiveInt("4000"),
    SUMMARY_MAX_WORDS: positiveInt("300"),
    KEY_POINTS_MAX: positiveInt("8"),
    QA_PAIRS: positiveInt("5"),
    TOPICS_MAX: positiveInt("6"),

    // ---------- Chunking / retrieval ----------
    CHUNK_MAX_CHARS: positiveInt("3000"),
    RETRIEVAL_TOP_K: positiveInt("5"),
    VECTOR_SCORE_THRESHOLD: ratio("0.3"),
    DOCUMENT_SIMILARITY_THRESHOLD: ratio("0.6"),
    KEYWORD_OVERLAP_RATIO: ratio("0.2"),
    ANSWER_SNIPPET_MAX_CHARS: positiveInt("600"),
    SYNTHESIZE_ANSWERS: flag("true"),
    CONTEXT_FORMAT: z.enum(["plain", "markdown", "xml"]).default("plain"),
  })
  .refine((env) => env.EMBEDDING_PROVIDER !== "bge-m3" || env.BGE_M3_URL !== undefined, {
    message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
    path: ["BGE_M3_URL"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      chatModel: parsed.COHERE_CHAT_MODEL,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    completion: {
      timeoutMs: parsed.COMPLETION_TIMEOUT_MS,
      temperature: parsed.COMPLETION_TEMPERATURE,
    },

    extraction: {
      minContentLength: parsed.MIN_CONTENT_LENGTH,
      doclingPython: parsed.DOCLING_PYTHON,
      doclingScript: parsed.DOCLING_SCRIPT,
    },

    enrichment: {
      maxSummaryWords: parsed.SUMMARY_MAX_WORDS,
      numQaPairs: parsed.QA_PAIRS,
      maxKeyPoints: parsed.KEY_POINTS_MAX,
      maxTopics: parsed.TOPICS_MAX,
      inputMaxChars: parsed.ENRICH_INPUT_MAX_CHARS,
      callTimeoutMs: parsed.COMPLETION_TIMEOUT_MS,
    },

    chunking: {
      maxChars: parsed.CHUNK_MAX_CHARS,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      vectorScoreThreshold: parsed.VECTOR_SCORE_THRESHOLD,
      documentSimilarityThreshold: parsed.DOCUMENT_SIMILARITY_THRESHOLD,
      keywordOverlapRatio: parsed.KEYWORD_OVERLAP_RATIO,
      snippetMaxChars: parsed.ANSWER_SNIPPET_MAX_CHARS,
      synthesizeAnswers: parsed.SYNTHESIZE_ANSWERS,
      contextFormat: parsed.CONTEXT_FORMAT,
    },
  };
}
