import type { RawDocument } from "./document.js";
import type { EnrichmentResult } from "./enrichment.js";
import type { PipelineEvent } from "./pipeline.js";

export interface MindMapNode {
  id: string;
  label: string;
  /** Full text shown as a tooltip when the label is truncated. */
  title: string;
  level: 0 | 1 | 2;
  parentId: string | null;
}

export interface MindMapEdge {
  from: string;
  to: string;
}

export interface MindMap {
  root: string;
  nodes: MindMapNode[];
  edges: MindMapEdge[];
}

export interface NotebookCell {
  cell_type: "markdown";
  metadata: Record<string, unknown>;
  source: string[];
}

export interface NotebookStructure {
  nbformat: 4;
  nbformat_minor: number;
  metadata: {
    document_info: {
      title: string;
      processing_timestamp: string;
      content_size: number;
      enhancement_quality: number;
    };
  };
  cells: NotebookCell[];
}

export interface DisplayContent {
  summary: string;
  qa: string;
  highlights: string;
}

export interface Degradation {
  stage: "enriching" | "assembling";
  code: string;
  message: string;
}

export interface NotebookArtifact {
  readonly document: RawDocument;
  readonly enrichment: EnrichmentResult;
  readonly mindMap: MindMap | null;
  readonly notebook: NotebookStructure;
  readonly display: DisplayContent;
  readonly lineage: readonly PipelineEvent[];
  readonly degradations: readonly Degradation[];
}
