import { ValidationError } from "@quire/errors";
import type {
  ContentEnrichedEvent,
  DocumentExtractedEvent,
  EnrichmentProvenance,
  EnrichmentResult,
  DegradedReason,
  ExtractedDocument,
  FailureCause,
  FailureStage,
  NotebookAssembledEvent,
  PipelineFailedEvent,
  RawDocument,
} from "@quire/types";

/**
 * Validate extractor output and freeze it. The returned document is shared by
 * every later stage, so nothing downstream can rewrite `content`.
 */
export function createRawDocument(
  extracted: ExtractedDocument,
  sourcePath: string,
  minContentLength: number,
): RawDocument {
  const fields: Record<string, string> = {};

  if (extracted.title.trim().length === 0) {
    fields["title"] = "Title must not be blank";
  }
  const contentLength = extracted.content.trim().length;
  if (contentLength < minContentLength) {
    fields["content"] =
      `Content has ${String(contentLength)} characters, at least ${String(minContentLength)} required`;
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Extracted document is not usable", fields, {
      details: { sourcePath },
    });
  }

  return Object.freeze({
    title: extracted.title,
    content: extracted.content,
    tables: Object.freeze(
      extracted.tables.map((table) =>
        Object.freeze({
          ...table,
          headers: [...table.headers],
          rows: table.rows.map((row) => [...row]),
        }),
      ),
    ),
    figures: Object.freeze(extracted.figures.map((figure) => Object.freeze({ ...figure }))),
    metadata: Object.freeze({ ...extracted.metadata }),
    sourcePath,
  });
}

export interface EnrichmentInput {
  summary: string;
  keyPoints: string[];
  questions: string[];
  answers: string[];
  topics: string[];
  qualityScore: number;
  provenance: EnrichmentProvenance;
  model: string;
  degradedReason?: DegradedReason;
}

export const MIN_ANSWER_LENGTH = 20;
export const MIN_ITEMS = 3;

export function createEnrichmentResult(input: EnrichmentInput): EnrichmentResult {
  const fields: Record<string, string> = {};

  if (input.summary.trim().length === 0) {
    fields["summary"] = "Summary must not be blank";
  }
  if (input.keyPoints.length < MIN_ITEMS) {
    fields["keyPoints"] = `At least ${String(MIN_ITEMS)} key points required`;
  }
  if (input.topics.length < MIN_ITEMS) {
    fields["topics"] = `At least ${String(MIN_ITEMS)} topics required`;
  }
  if (input.questions.length !== input.answers.length) {
    fields["qa"] =
      `${String(input.questions.length)} questions paired with ${String(input.answers.length)} answers`;
  } else if (input.questions.length < MIN_ITEMS) {
    fields["qa"] = `At least ${String(MIN_ITEMS)} question/answer pairs required`;
  } else if (input.questions.some((q) => !q.endsWith("?"))) {
    fields["qa"] = "Every question must end with '?'";
  } else if (input.answers.some((a) => a.length < MIN_ANSWER_LENGTH)) {
    fields["qa"] = `Every answer must be at least ${String(MIN_ANSWER_LENGTH)} characters`;
  }
  if (!(input.qualityScore >= 0 && input.qualityScore <= 1)) {
    fields["qualityScore"] = "Quality score must be within [0, 1]";
  }
  if (Object.keys(fields).length > 0) {
    throw new ValidationError("Enrichment result violates its invariants", fields);
  }

  const degraded = Object.values(input.provenance).some((source) => source === "fallback");

  return Object.freeze({
    summary: input.summary,
    keyPoints: Object.freeze([...input.keyPoints]),
    questions: Object.freeze([...input.questions]),
    answers: Object.freeze([...input.answers]),
    topics: Object.freeze([...input.topics]),
    qualityScore: input.qualityScore,
    provenance: Object.freeze({ ...input.provenance }),
    model: input.model,
    degraded,
    ...(degraded ? { degradedReason: input.degradedReason ?? "partial" } : {}),
  });
}

export function documentExtracted(document: RawDocument, durationMs: number): DocumentExtractedEvent {
  return Object.freeze({ type: "document.extracted", at: new Date(), document, durationMs });
}

export function contentEnriched(
  document: RawDocument,
  enrichment: EnrichmentResult,
  durationMs: number,
): ContentEnrichedEvent {
  return Object.freeze({ type: "content.enriched", at: new Date(), document, enrichment, durationMs });
}

export function notebookAssembled(
  document: RawDocument,
  enrichment: EnrichmentResult,
  mindMapGenerated: boolean,
): NotebookAssembledEvent {
  return Object.freeze({
    type: "notebook.assembled",
    at: new Date(),
    document,
    enrichment,
    mindMapGenerated,
  });
}

export function pipelineFailed(
  stage: FailureStage,
  cause: FailureCause,
  recoverable: boolean,
): PipelineFailedEvent {
  return Object.freeze({
    type: "pipeline.failed",
    at: new Date(),
    stage,
    cause: Object.freeze({ ...cause }),
    recoverable,
  });
}
