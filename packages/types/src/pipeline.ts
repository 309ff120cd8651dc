import type { RawDocument } from "./document.js";
import type { EnrichmentResult } from "./enrichment.js";
import type { NotebookArtifact } from "./notebook.js";

export type PipelineState = "extracting" | "enriching" | "assembling" | "ready" | "failed";

export type FailureStage = "extracting" | "enriching" | "assembling" | "storing";

export interface DocumentExtractedEvent {
  readonly type: "document.extracted";
  readonly at: Date;
  readonly document: RawDocument;
  readonly durationMs: number;
}

export interface ContentEnrichedEvent {
  readonly type: "content.enriched";
  readonly at: Date;
  readonly document: RawDocument;
  readonly enrichment: EnrichmentResult;
  readonly durationMs: number;
}

export interface NotebookAssembledEvent {
  readonly type: "notebook.assembled";
  readonly at: Date;
  readonly document: RawDocument;
  readonly enrichment: EnrichmentResult;
  readonly mindMapGenerated: boolean;
}

export interface PipelineFailedEvent {
  readonly type: "pipeline.failed";
  readonly at: Date;
  readonly stage: FailureStage;
  readonly cause: FailureCause;
  readonly recoverable: boolean;
}

export type PipelineEvent =
  | DocumentExtractedEvent
  | ContentEnrichedEvent
  | NotebookAssembledEvent
  | PipelineFailedEvent;

export interface FailureCause {
  name: string;
  code: string;
  message: string;
}

export interface PartialResult {
  title: string;
  sourcePath: string;
  completedStages: PipelineState[];
  note: string;
  artifact?: NotebookArtifact;
}

export interface FailureReport {
  status: "failed";
  stage: FailureStage;
  cause: FailureCause;
  recoverable: boolean;
  partial: PartialResult;
}

export interface PipelineSuccess {
  status: "ready";
  artifact: NotebookArtifact;
}

export type PipelineOutcome = PipelineSuccess | FailureReport;

export interface ProcessSuccess extends PipelineSuccess {
  documentId: string;
}

export type ProcessResult = ProcessSuccess | FailureReport;
