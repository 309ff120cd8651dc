export {
  createRawDocument,
  createEnrichmentResult,
  documentExtracted,
  contentEnriched,
  notebookAssembled,
  pipelineFailed,
} from "./events.js";
export type { EnrichmentInput } from "./events.js";

export { cleanLlmOutput, parseNumberedList, parseQaPairs, parseTopicList } from "./content-parsers.js";
export { buildFallbackFields } from "./fallback-content.js";
export type { FallbackFields } from "./fallback-content.js";
export { scoreEnrichment } from "./quality-score.js";
export { EnrichmentService, prepareContent, DEFAULT_ENRICHMENT } from "./enrichment-service.js";
export type { EnrichmentDependencies, Outcome } from "./enrichment-service.js";

export { buildMindMap } from "./mind-map.js";
export { buildNotebook, minimalNotebook, buildDisplay, formatQa, formatHighlights } from "./notebook-structure.js";

export {
  PipelineOrchestrator,
  PipelineRun,
  canTransition,
  toFailureCause,
} from "./pipeline-orchestrator.js";
export type { PipelineDependencies, PipelineHooks, Enricher } from "./pipeline-orchestrator.js";

export { ChunkStore } from "./chunk-store.js";
export type { ChunkStoreDependencies, PutOptions } from "./chunk-store.js";

export { assembleContext } from "./context-assembler.js";
export type { ContextFormat } from "./context-assembler.js";
export { RetrievalEngine, DEFAULT_RETRIEVAL, formatAnswerMarkdown } from "./retrieval-engine.js";
export type { RetrievalDependencies } from "./retrieval-engine.js";

export { NotebookService } from "./notebook-service.js";
export type { NotebookServiceDependencies } from "./notebook-service.js";
