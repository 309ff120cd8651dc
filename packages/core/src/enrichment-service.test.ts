import { describe, it, expect, vi } from "vitest";
import type { CompletionOptions, ICompletionClient } from "@quire/completions";
import { CompletionError } from "@quire/errors";
import { createLogger } from "@quire/logger";
import { createRawDocument } from "./events.js";
import { EnrichmentService, prepareContent } from "./enrichment-service.js";

const logger = createLogger({ level: "silent" });

const SUMMARY = `Summary: ${Array.from({ length: 60 }, (_, i) => `term${String(i)}`).join(" ")}`;
const KEY_POINTS = Array.from(
  { length: 10 },
  (_, i) => `${String(i + 1)}. Key point number ${String(i + 1)} about solar power`,
).join("\n");
const QA = Array.from(
  { length: 5 },
  (_, i) =>
    `Q${String(i + 1)}: What does section ${String(i + 1)} describe\nA${String(i + 1)}: Section ${String(i + 1)} describes how solar panels are installed.\n`,
).join("\n");
const TOPICS = "- Solar Energy\n- Panels\n- Installation\n- Policy\n- Storage\n- Grid\n- Finance";

function respondByPrompt(overrides: { qa?: string } = {}) {
  return async (prompt: string): Promise<string> => {
    if (prompt.startsWith("Create a clear")) return SUMMARY;
    if (prompt.startsWith("Extract the")) return KEY_POINTS;
    if (prompt.startsWith("Identify the")) return TOPICS;
    return overrides.qa ?? QA;
  };
}

function fakeCompletion(respond: (prompt: string, options?: CompletionOptions) => Promise<string>) {
  const complete = vi.fn(respond);
  const client: ICompletionClient = {
    name: "fake",
    model: "fake-model",
    complete,
    healthCheck: async () => true,
  };
  return { client, complete };
}

function makeDocument(content = "Solar panels convert sunlight into electricity for homes and businesses.") {
  return createRawDocument(
    { title: "Solar Guide", content, tables: [], figures: [], metadata: {} },
    "/docs/solar.md",
    10,
  );
}

describe("prepareContent", () => {
  it("collapses blank lines and runs of spaces", () => {
    expect(prepareContent("a\n\n\n\nb   \t c  ", 100)).toBe("a\n\nb c");
  });

  it("cuts after the last full stop when it lies beyond 80% of the ceiling", () => {
    const content = `${"x".repeat(90)}.${"y".repeat(20)}`;

    expect(prepareContent(content, 100)).toBe(`${"x".repeat(90)}.`);
  });

  it("cuts at the ceiling otherwise", () => {
    const content = `${"x".repeat(50)}.${"y".repeat(60)}`;

    expect(prepareContent(content, 100)).toHaveLength(100);
  });
});

describe("EnrichmentService", () => {
  it("keeps valid model output and caps each field", async () => {
    const { client, complete } = fakeCompletion(respondByPrompt());
    const service = new EnrichmentService({ completion: client, logger });

    const result = await service.enrich(makeDocument());

    expect(result.summary.startsWith("term0 term1")).toBe(true);
    expect(result.keyPoints).toHaveLength(8);
    expect(result.questions).toHaveLength(5);
    expect(result.questions[0]).toBe("What does section 1 describe?");
    expect(result.topics).toEqual(["Solar Energy", "Panels", "Installation", "Policy", "Storage", "Grid"]);
    expect(result.provenance).toEqual({ summary: "model", keyPoints: "model", qa: "model", topics: "model" });
    expect(result.degraded).toBe(false);
    expect(result.model).toBe("fake-model");
    expect(result.qualityScore).toBe(1);
    expect(complete).toHaveBeenCalledTimes(4);
    expect(complete.mock.calls.every(([, options]) => options?.signal instanceof AbortSignal)).toBe(true);
  });

  it("sends only the truncated copy of long content to the model", async () => {
    const { client, complete } = fakeCompletion(respondByPrompt());
    const service = new EnrichmentService({ completion: client, logger });
    const content = `${"Solar panels need sunlight. ".repeat(200)}ENDMARKER`;
    const document = makeDocument(content);

    await service.enrich(document);

    expect(complete.mock.calls.some(([prompt]) => prompt.includes("ENDMARKER"))).toBe(false);
    expect(document.content).toBe(content);
  });

  it("falls back field by field when the model always fails", async () => {
    const { client } = fakeCompletion(async () => {
      throw new CompletionError("Completion circuit is open", "cohere");
    });
    const service = new EnrichmentService({ completion: client, logger });

    const result = await service.enrich(makeDocument());

    expect(result.provenance).toEqual({
      summary: "fallback",
      keyPoints: "fallback",
      qa: "fallback",
      topics: "fallback",
    });
    expect(result.degraded).toBe(true);
    expect(result.degradedReason).toBe("partial");
    expect(result.model).toBe("fallback");
    expect(result.qualityScore).toBeLessThanOrEqual(0.5);
    expect(result.questions).toHaveLength(result.answers.length);
    expect(result.keyPoints.length).toBeGreaterThanOrEqual(3);
  });

  it("replaces only the field that fails validation", async () => {
    const shortQa = "Q1: Why?\nA1: Because panels make power from light.\nQ2: How?\nA2: By converting photons.\nQ3: When?\nA3: Whenever the sun is shining.";
    const { client } = fakeCompletion(respondByPrompt({ qa: shortQa }));
    const service = new EnrichmentService({ completion: client, logger });

    const result = await service.enrich(makeDocument());

    expect(result.provenance).toEqual({ summary: "model", keyPoints: "model", qa: "fallback", topics: "model" });
    expect(result.questions[0]).toBe("What is 'Solar Guide' about?");
    expect(result.degradedReason).toBe("partial");
    expect(result.model).toBe("fake-model");
  });

  it("aborts in-flight calls and falls back wholesale when the deadline passes", async () => {
    const { client, complete } = fakeCompletion(
      (_prompt, options) =>
        new Promise<string>((_resolve, reject) => {
          options?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        }),
    );
    const service = new EnrichmentService({ completion: client, logger, config: { callTimeoutMs: 10 } });

    const result = await service.enrich(makeDocument());

    expect(result.degradedReason).toBe("timeout");
    expect(result.model).toBe("fallback");
    expect(complete.mock.calls.every(([, options]) => options?.signal?.aborted === true)).toBe(true);
  });

  it("uses fallback content when no completion client is configured", async () => {
    const service = new EnrichmentService({ completion: null, logger });

    const result = await service.enrich(makeDocument());

    expect(result.model).toBe("fallback");
    expect(result.degradedReason).toBe("stage_failure");
    expect(result.qualityScore).toBeLessThanOrEqual(0.5);
  });
});
