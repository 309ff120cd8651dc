import type { MindMap, NotebookStructure } from "./notebook.js";

export interface TableRef {
  index: number;
  caption: string;
  headers: string[];
  rows: string[][];
}

export interface FigureRef {
  index: number;
  caption: string;
  source: string;
}

/**
 * What a content extractor hands back before validation.
 */
export interface ExtractedDocument {
  title: string;
  content: string;
  tables: TableRef[];
  figures: FigureRef[];
  metadata: Record<string, unknown>;
}

/**
 * Validated, frozen extraction output. Every pipeline stage holds a reference
 * to the same instance; `content` is never rewritten after creation.
 */
export interface RawDocument {
  readonly title: string;
  readonly content: string;
  readonly tables: readonly TableRef[];
  readonly figures: readonly FigureRef[];
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly sourcePath: string;
}

export interface StoredDocument {
  id: string;
  title: string;
  content: string;
  summary: string;
  keyPoints: string[];
  questions: string[];
  answers: string[];
  topics: string[];
  qAndA: string;
  bulletPoints: string;
  mindMap: MindMap | null;
  notebook: NotebookStructure | null;
  metadata: Record<string, unknown>;
  tables: TableRef[];
  figures: FigureRef[];
  summaryEmbedding: number[] | null;
  qualityScore: number;
  isProcessed: boolean;
  processingError: string | null;
  sourcePath: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface DocumentStats {
  totalDocuments: number;
  processedDocuments: number;
  totalContentLength: number;
  recentDocuments: string[];
  documentNames: string[];
}
