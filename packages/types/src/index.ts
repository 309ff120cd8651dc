export type {
  TableRef,
  FigureRef,
  ExtractedDocument,
  RawDocument,
  StoredDocument,
  DocumentStats,
} from "./document.js";
export type {
  FieldSource,
  EnrichmentField,
  EnrichmentProvenance,
  DegradedReason,
  EnrichmentResult,
  EnrichmentConfig,
} from "./enrichment.js";
export type {
  ChunkKind,
  Chunk,
  ChunkResult,
  ChunkingConfig,
  ScoredChunk,
  EmbeddingResult,
  EmbeddingInputType,
} from "./chunk.js";
export type {
  MindMapNode,
  MindMapEdge,
  MindMap,
  NotebookCell,
  NotebookStructure,
  DisplayContent,
  Degradation,
  NotebookArtifact,
} from "./notebook.js";
export type {
  PipelineState,
  FailureStage,
  DocumentExtractedEvent,
  ContentEnrichedEvent,
  NotebookAssembledEvent,
  PipelineFailedEvent,
  PipelineEvent,
  FailureCause,
  PartialResult,
  FailureReport,
  PipelineSuccess,
  PipelineOutcome,
  ProcessSuccess,
  ProcessResult,
} from "./pipeline.js";
export type {
  RetrievalTier,
  Citation,
  Answer,
  RetrievalConfig,
  ContextFormat,
} from "./query.js";
export type {
  EmbeddingProviderType,
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  WorkerConfig,
  CohereConfig,
  EmbeddingConfig,
  CompletionConfig,
  ExtractionConfig,
} from "./config.js";
export type { JobType, JobStatus, JobData, ProcessJobData, JobResult } from "./job.js";
