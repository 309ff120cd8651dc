import { WhitespaceChunker } from "@quire/chunker";
import {
  CohereCompletionClient,
  createCompletionClient,
  type ICompletionClient,
} from "@quire/completions";
import {
  ChunkStore,
  EnrichmentService,
  NotebookService,
  PipelineOrchestrator,
  RetrievalEngine,
} from "@quire/core";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@quire/embeddings";
import { createChildLogger, type Logger } from "@quire/logger";
import { createExtractor, type IExtractor } from "@quire/parser";
import { createDocumentRepository, type IDocumentRepository } from "@quire/store";
import type { AppConfig } from "@quire/types";

export type HealthStatus = "ok" | "failing" | "disabled";

export interface HealthReport {
  repository: HealthStatus;
  embeddings: HealthStatus;
  completion: HealthStatus;
}

export interface Container {
  service: NotebookService;
  repository: IDocumentRepository;
  /** Probe each configured backend once; unconfigured ones report "disabled". */
  checkHealth(): Promise<HealthReport>;
  close(): Promise<void>;
}

export interface ContainerOverrides {
  repository?: IDocumentRepository;
  extractor?: IExtractor;
  embeddings?: IEmbeddingProvider | null;
  completion?: ICompletionClient | null;
}

export function createEmbeddings(config: AppConfig, logger: Logger): IEmbeddingProvider | null {
  return createEmbeddingProvider({
    provider: config.embedding.provider,
    dimensions: config.embedding.dimensions,
    apiKey: config.cohere.apiKey,
    model: config.cohere.embedModel,
    timeoutMs: config.completion.timeoutMs,
    bgeM3Url: config.embedding.bgeM3Url,
    logger,
  });
}

async function probe(target: { healthCheck(): Promise<boolean> } | null): Promise<HealthStatus> {
  if (!target) return "disabled";
  return (await target.healthCheck()) ? "ok" : "failing";
}

/**
 * Wire the service graph from configuration. Anything not configured is
 * left out: no DATABASE_URL means an in-memory repository, no Cohere key
 * means no embeddings or completions.
 */
export function createContainer(
  config: AppConfig,
  logger: Logger,
  overrides: ContainerOverrides = {},
): Container {
  const log = createChildLogger(logger, { component: "container" });

  const repository =
    overrides.repository ??
    createDocumentRepository({
      url: config.database.url,
      poolMax: config.database.poolMax,
      dimensions: config.embedding.dimensions,
    });
  const embeddings = overrides.embeddings !== undefined ? overrides.embeddings : createEmbeddings(config, logger);
  const completion =
    overrides.completion !== undefined
      ? overrides.completion
      : createCompletionClient({
          apiKey: config.cohere.apiKey,
          model: config.cohere.chatModel,
          timeoutMs: config.completion.timeoutMs,
          temperature: config.completion.temperature,
          logger,
        });

  const orchestrator = new PipelineOrchestrator({
    extractor: overrides.extractor ?? createExtractor(config.extraction),
    enricher: new EnrichmentService({ completion, config: config.enrichment, logger }),
    minContentLength: config.extraction.minContentLength,
    logger,
  });
  const store = new ChunkStore({
    repository,
    chunker: new WhitespaceChunker(),
    embeddings,
    chunking: config.chunking,
    dimensions: config.embedding.dimensions,
    logger,
  });
  const retrieval = new RetrievalEngine({
    repository,
    embeddings,
    completion,
    config: config.retrieval,
    logger,
  });

  log.info(
    {
      repository: config.database.url ? "postgres" : "memory",
      embeddings: embeddings?.name ?? "none",
      completion: completion?.name ?? "none",
    },
    "Service container ready",
  );

  return {
    service: new NotebookService({ orchestrator, store, retrieval, logger }),
    repository,
    checkHealth: async () => {
      const [repositoryStatus, embeddingsStatus, completionStatus] = await Promise.all([
        probe(repository),
        probe(embeddings),
        probe(completion),
      ]);
      return {
        repository: repositoryStatus,
        embeddings: embeddingsStatus,
        completion: completionStatus,
      };
    },
    close: async () => {
      if (completion instanceof CohereCompletionClient) completion.close();
      await repository.close();
    },
  };
}
