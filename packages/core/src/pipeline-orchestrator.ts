import { basename } from "node:path";
import {
  AppError,
  AssemblyError,
  EnhancementError,
  ExtractionError,
  errorMessage,
  toAppError,
} from "@quire/errors";
import { createChildLogger, type Logger } from "@quire/logger";
import type { IExtractor } from "@quire/parser";
import type {
  ContentEnrichedEvent,
  Degradation,
  DegradedReason,
  DocumentExtractedEvent,
  EnrichmentResult,
  FailureCause,
  FailureReport,
  FailureStage,
  DisplayContent,
  MindMap,
  NotebookAssembledEvent,
  NotebookStructure,
  PipelineEvent,
  PipelineFailedEvent,
  PipelineOutcome,
  PipelineState,
  RawDocument,
} from "@quire/types";
import {
  contentEnriched,
  createRawDocument,
  documentExtracted,
  notebookAssembled,
  pipelineFailed,
} from "./events.js";
import { buildMindMap } from "./mind-map.js";
import { buildDisplay, buildNotebook, minimalNotebook } from "./notebook-structure.js";

const TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  extracting: ["enriching", "failed"],
  enriching: ["assembling", "failed"],
  assembling: ["ready", "failed"],
  ready: [],
  failed: [],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Tracks one run's position in the state machine. */
export class PipelineRun {
  private current: PipelineState = "extracting";
  private readonly completed: PipelineState[] = [];

  get state(): PipelineState {
    return this.current;
  }

  get completedStages(): PipelineState[] {
    return [...this.completed];
  }

  transition(to: PipelineState): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Illegal pipeline transition ${this.current} -> ${to}`);
    }
    if (to !== "failed") this.completed.push(this.current);
    this.current = to;
  }
}

export interface Enricher {
  enrich(document: RawDocument): Promise<EnrichmentResult>;
  fallback(document: RawDocument, reason: DegradedReason): EnrichmentResult;
}

export interface PipelineHooks {
  onExtracted?: (event: DocumentExtractedEvent) => Promise<void> | void;
  onEnriched?: (event: ContentEnrichedEvent) => Promise<void> | void;
  onAssembled?: (event: NotebookAssembledEvent) => Promise<void> | void;
  onFailed?: (event: PipelineFailedEvent) => Promise<void> | void;
}

export interface PipelineDependencies extends PipelineHooks {
  extractor: IExtractor;
  enricher: Enricher;
  logger: Logger;
  /** Shortest accepted trimmed content. Defaults to 10. */
  minContentLength?: number;
  buildMindMap?: (title: string, topics: readonly string[], keyPoints: readonly string[]) => MindMap;
  buildNotebook?: (document: RawDocument, enrichment: EnrichmentResult) => NotebookStructure;
}

type Hook<E extends PipelineEvent> = ((event: E) => Promise<void> | void) | undefined;

export function toFailureCause(error: AppError): FailureCause {
  return { name: error.name, code: error.code, message: error.message };
}

/**
 * Extract -> Enrich -> Assemble.
 *
 * Extraction failures end the run with a FailureReport. Enrichment and
 * assembly failures degrade the artifact instead: the whole-stage fallback
 * enrichment, or an artifact without a mind map. Each stage emits one frozen
 * event; the artifact's lineage is that chain. No state survives a run.
 */
export class PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly minContentLength: number;
  private readonly mindMapBuilder: NonNullable<PipelineDependencies["buildMindMap"]>;
  private readonly notebookBuilder: NonNullable<PipelineDependencies["buildNotebook"]>;

  constructor(private readonly deps: PipelineDependencies) {
    this.logger = createChildLogger(deps.logger, { component: "pipeline" });
    this.minContentLength = deps.minContentLength ?? 10;
    this.mindMapBuilder = deps.buildMindMap ?? buildMindMap;
    this.notebookBuilder =
      deps.buildNotebook ?? ((document, enrichment) => buildNotebook(document, enrichment));
  }

  async run(filePath: string, title: string): Promise<PipelineOutcome> {
    const run = new PipelineRun();
    const lineage: PipelineEvent[] = [];
    const degradations: Degradation[] = [];
    const requestedTitle = title.trim();
    const log = this.logger.child({ sourcePath: filePath });

    // Extract
    const extractStart = Date.now();
    let document: RawDocument;
    try {
      const extracted = await this.deps.extractor.extract(filePath);
      document = createRawDocument(
        { ...extracted, title: requestedTitle || extracted.title },
        filePath,
        this.minContentLength,
      );
    } catch (err) {
      const error = toAppError(
        err,
        (message, cause) => new ExtractionError(message, filePath, { cause }),
      );
      return this.fail(run, "extracting", error, false, {
        title: requestedTitle || basename(filePath),
        sourcePath: filePath,
        note: `No content could be extracted from ${basename(filePath)}; nothing was produced.`,
      });
    }

    const extractedEvent = documentExtracted(document, Date.now() - extractStart);
    lineage.push(extractedEvent);
    await this.emit(this.deps.onExtracted, extractedEvent);
    log.info(
      { title: document.title, contentLength: document.content.length },
      "Document extracted",
    );
    run.transition("enriching");

    // Enrich
    const enrichStart = Date.now();
    let enrichment: EnrichmentResult;
    try {
      enrichment = await this.deps.enricher.enrich(document);
    } catch (err) {
      const error = toAppError(err, (message, cause) => new EnhancementError(message, { cause }));
      log.warn({ err: error }, "Enrichment failed, substituting fallback content");
      degradations.push({ stage: "enriching", code: error.code, message: error.message });
      enrichment = this.deps.enricher.fallback(document, "stage_failure");
    }

    const enrichedEvent = contentEnriched(document, enrichment, Date.now() - enrichStart);
    lineage.push(enrichedEvent);
    await this.emit(this.deps.onEnriched, enrichedEvent);
    run.transition("assembling");

    // Assemble
    const assemble = <T>(part: string, build: () => T, substitute: () => T): T => {
      try {
        return build();
      } catch (err) {
        const error = toAppError(err, (message, cause) => new AssemblyError(message, { cause }));
        log.warn({ err: error, part }, "Assembly step failed, continuing with a substitute");
        degradations.push({ stage: "assembling", code: error.code, message: error.message });
        return substitute();
      }
    };
    const mindMap: MindMap | null = assemble<MindMap | null>(
      "mind map",
      () => this.mindMapBuilder(document.title, enrichment.topics, enrichment.keyPoints),
      () => null,
    );
    const notebook = assemble(
      "notebook",
      () => this.notebookBuilder(document, enrichment),
      () => minimalNotebook(document, enrichment),
    );
    const display = assemble<DisplayContent>(
      "display",
      () => buildDisplay(enrichment),
      () => ({ summary: enrichment.summary, qa: "", highlights: "" }),
    );

    const assembledEvent = notebookAssembled(document, enrichment, mindMap !== null);
    lineage.push(assembledEvent);
    await this.emit(this.deps.onAssembled, assembledEvent);
    run.transition("ready");

    log.info(
      {
        title: document.title,
        qualityScore: enrichment.qualityScore,
        degradations: degradations.length,
      },
      "Notebook ready",
    );

    return {
      status: "ready",
      artifact: Object.freeze({
        document,
        enrichment,
        mindMap,
        notebook,
        display,
        lineage: Object.freeze(lineage),
        degradations: Object.freeze(degradations),
      }),
    };
  }

  /** Hooks observe the run; one that throws is logged and the run goes on. */
  private async emit<E extends PipelineEvent>(hook: Hook<E>, event: E): Promise<void> {
    if (!hook) return;
    try {
      await hook(event);
    } catch (err) {
      this.logger.warn({ event: event.type, err: errorMessage(err) }, "Pipeline hook failed");
    }
  }

  private async fail(
    run: PipelineRun,
    stage: FailureStage,
    error: AppError,
    recoverable: boolean,
    partial: { title: string; sourcePath: string; note: string },
  ): Promise<FailureReport> {
    const cause = toFailureCause(error);
    const event = pipelineFailed(stage, cause, recoverable);
    run.transition("failed");
    this.logger.error({ err: error, stage, sourcePath: partial.sourcePath }, "Pipeline failed");
    await this.emit(this.deps.onFailed, event);

    return {
      status: "failed",
      stage,
      cause,
      recoverable,
      partial: { ...partial, completedStages: run.completedStages },
    };
  }
}
