import type { EnrichmentConfig } from "./enrichment.js";
import type { RetrievalConfig } from "./query.js";

export type EmbeddingProviderType = "cohere" | "bge-m3";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  worker: WorkerConfig;
  cohere: CohereConfig;
  embedding: EmbeddingConfig;
  completion: CompletionConfig;
  extraction: ExtractionConfig;
  enrichment: EnrichmentConfig;
  chunking: { maxChars: number };
  retrieval: RetrievalConfig;
}

export interface DatabaseConfig {
  /** Absent when running against the in-memory repository. */
  url?: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface WorkerConfig {
  concurrency: number;
}

export interface CohereConfig {
  /** Empty when no key is configured; AI clients are then disabled. */
  apiKey: string;
  embedModel: string;
  chatModel: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  bgeM3Url?: string;
}

export interface CompletionConfig {
  timeoutMs: number;
  temperature: number;
}

export interface ExtractionConfig {
  minContentLength: number;
  doclingPython: string;
  doclingScript: string;
}
