import { describe, it, expect, vi } from "vitest";
import { createLogger } from "@quire/logger";
import type { IExtractor } from "@quire/parser";
import type { ExtractedDocument, PipelineEvent } from "@quire/types";
import { EnrichmentService } from "./enrichment-service.js";
import {
  canTransition,
  PipelineOrchestrator,
  PipelineRun,
  type PipelineDependencies,
} from "./pipeline-orchestrator.js";

const logger = createLogger({ level: "silent" });

function extracted(overrides: Partial<ExtractedDocument> = {}): ExtractedDocument {
  return {
    title: "Extracted Title",
    content: "Tidal energy uses the rise and fall of the sea. Barrages hold water back at high tide.",
    tables: [],
    figures: [],
    metadata: { extension: ".md" },
    ...overrides,
  };
}

function fakeExtractor(extract: (filePath: string) => Promise<ExtractedDocument>): IExtractor {
  return { supportedExtensions: [".md"], extract };
}

function makeOrchestrator(extractor: IExtractor, overrides: Partial<PipelineDependencies> = {}) {
  return new PipelineOrchestrator({
    extractor,
    enricher: new EnrichmentService({ completion: null, logger }),
    logger,
    ...overrides,
  });
}

describe("transition table", () => {
  it("only moves forward or to failed", () => {
    expect(canTransition("extracting", "enriching")).toBe(true);
    expect(canTransition("assembling", "failed")).toBe(true);
    expect(canTransition("extracting", "ready")).toBe(false);
    expect(canTransition("enriching", "extracting")).toBe(false);
    expect(canTransition("ready", "failed")).toBe(false);
  });

  it("throws on an illegal transition", () => {
    const run = new PipelineRun();
    run.transition("enriching");

    expect(() => run.transition("ready")).toThrow("Illegal pipeline transition enriching -> ready");
    expect(run.completedStages).toEqual(["extracting"]);
  });
});

describe("PipelineOrchestrator", () => {
  it("produces an artifact whose lineage is one event per stage", async () => {
    const seen: string[] = [];
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted()), {
      onExtracted: (event) => void seen.push(event.type),
      onEnriched: (event) => void seen.push(event.type),
      onAssembled: (event) => void seen.push(event.type),
    });

    const outcome = await orchestrator.run("/docs/tides.md", "  Tides  ");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    const { artifact } = outcome;
    expect(artifact.document.title).toBe("Tides");
    expect(artifact.lineage.map((event: PipelineEvent) => event.type)).toEqual([
      "document.extracted",
      "content.enriched",
      "notebook.assembled",
    ]);
    expect(seen).toEqual(["document.extracted", "content.enriched", "notebook.assembled"]);
    expect(artifact.mindMap?.root).toBe("Tides");
    expect(artifact.degradations).toEqual([]);
    expect(artifact.notebook.cells[0]?.source[0]).toBe("# Tides\n\n");
  });

  it("keeps every character of content longer than the enrichment ceiling", async () => {
    const content = "Waves carry energy across the ocean surface. ".repeat(250);
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted({ content })));

    const outcome = await orchestrator.run("/docs/waves.md", "");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    expect(outcome.artifact.document.content.length).toBe(content.length);
    expect(outcome.artifact.document.title).toBe("Extracted Title");
  });

  it("reports an extraction failure as terminal", async () => {
    const onFailed = vi.fn();
    const orchestrator = makeOrchestrator(
      fakeExtractor(async () => {
        throw new Error("disk gone");
      }),
      { onFailed },
    );

    const outcome = await orchestrator.run("/docs/missing.pdf", "Requested");

    expect(outcome).toEqual({
      status: "failed",
      stage: "extracting",
      cause: { name: "ExtractionError", code: "EXTRACTION_FAILED", message: "disk gone" },
      recoverable: false,
      partial: {
        title: "Requested",
        sourcePath: "/docs/missing.pdf",
        completedStages: [],
        note: "No content could be extracted from missing.pdf; nothing was produced.",
      },
    });
    expect(onFailed).toHaveBeenCalledTimes(1);
    expect(onFailed.mock.calls[0]?.[0]).toMatchObject({ type: "pipeline.failed", stage: "extracting" });
  });

  it("rejects content below the floor", async () => {
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted({ content: " tiny " })));

    const outcome = await orchestrator.run("/docs/tiny.txt", "");

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") return;
    expect(outcome.cause.code).toBe("VALIDATION_ERROR");
    expect(outcome.partial.title).toBe("tiny.txt");
  });

  it("substitutes fallback enrichment when the enricher throws", async () => {
    const fallbackSource = new EnrichmentService({ completion: null, logger });
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted()), {
      enricher: {
        enrich: async () => {
          throw new Error("model exploded");
        },
        fallback: (document, reason) => fallbackSource.fallback(document, reason),
      },
    });

    const outcome = await orchestrator.run("/docs/tides.md", "Tides");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    expect(outcome.artifact.enrichment.degradedReason).toBe("stage_failure");
    expect(outcome.artifact.degradations).toEqual([
      { stage: "enriching", code: "ENHANCEMENT_FAILED", message: "model exploded" },
    ]);
  });

  it("returns the artifact without a mind map when assembly fails", async () => {
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted()), {
      buildMindMap: () => {
        throw new Error("layout failed");
      },
    });

    const outcome = await orchestrator.run("/docs/tides.md", "Tides");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    expect(outcome.artifact.mindMap).toBeNull();
    expect(outcome.artifact.degradations).toEqual([
      { stage: "assembling", code: "ASSEMBLY_FAILED", message: "layout failed" },
    ]);
    expect(outcome.artifact.lineage[2]).toMatchObject({ type: "notebook.assembled", mindMapGenerated: false });
  });

  it("keeps the notebook's title and summary when the full layout fails", async () => {
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted()), {
      buildNotebook: () => {
        throw new Error("cells broke");
      },
    });

    const outcome = await orchestrator.run("/docs/tides.md", "Tides");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    const { notebook, enrichment, degradations } = outcome.artifact;
    expect(degradations).toEqual([
      { stage: "assembling", code: "ASSEMBLY_FAILED", message: "cells broke" },
    ]);
    expect(notebook.cells).toHaveLength(2);
    expect(notebook.cells[0]?.source).toEqual(["# Tides\n\n", enrichment.summary]);
    expect(outcome.artifact.mindMap).not.toBeNull();
  });

  it("finishes the run when a hook throws", async () => {
    const seen: string[] = [];
    const orchestrator = makeOrchestrator(fakeExtractor(async () => extracted()), {
      onEnriched: () => {
        throw new Error("listener crashed");
      },
      onAssembled: (event) => void seen.push(event.type),
    });

    const outcome = await orchestrator.run("/docs/tides.md", "Tides");

    expect(outcome.status).toBe("ready");
    if (outcome.status !== "ready") return;
    expect(outcome.artifact.lineage.map((event) => event.type)).toEqual([
      "document.extracted",
      "content.enriched",
      "notebook.assembled",
    ]);
    expect(outcome.artifact.degradations).toEqual([]);
    expect(seen).toEqual(["notebook.assembled"]);
  });

  it("still returns the failure report when the failure hook throws", async () => {
    const orchestrator = makeOrchestrator(
      fakeExtractor(async () => {
        throw new Error("unreadable");
      }),
      {
        onFailed: async () => {
          throw new Error("listener crashed");
        },
      },
    );

    const outcome = await orchestrator.run("/docs/tides.md", "Tides");

    expect(outcome).toMatchObject({ status: "failed", stage: "extracting", recoverable: false });
  });
});
