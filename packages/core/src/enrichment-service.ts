import type { ICompletionClient } from "@quire/completions";
import { EnhancementError, errorMessage } from "@quire/errors";
import { createChildLogger, type Logger } from "@quire/logger";
import type {
  DegradedReason,
  EnrichmentConfig,
  EnrichmentField,
  EnrichmentProvenance,
  EnrichmentResult,
  RawDocument,
} from "@quire/types";
import { createEnrichmentResult, MIN_ANSWER_LENGTH, MIN_ITEMS } from "./events.js";
import { buildFallbackFields, type FallbackFields } from "./fallback-content.js";
import { cleanLlmOutput, parseNumberedList, parseQaPairs, parseTopicList } from "./content-parsers.js";
import { keyPointsPrompt, qaPrompt, summaryPrompt, topicsPrompt } from "./prompts.js";
import { scoreEnrichment } from "./quality-score.js";

export const DEFAULT_ENRICHMENT: EnrichmentConfig = {
  maxSummaryWords: 300,
  numQaPairs: 5,
  maxKeyPoints: 8,
  maxTopics: 6,
  inputMaxChars: 4000,
  callTimeoutMs: 60_000,
};

const MIN_SUMMARY_CHARS = 50;
const MIN_QUESTION_CHARS = 10;
const FALLBACK_MODEL = "fallback";

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface QaPairs {
  questions: string[];
  answers: string[];
}

type Slots = [Outcome<string>, Outcome<string[]>, Outcome<QaPairs>, Outcome<string[]>];

export interface EnrichmentDependencies {
  /** Absent when no completion backend is configured; every field then falls back. */
  completion: ICompletionClient | null;
  config?: Partial<EnrichmentConfig>;
  logger: Logger;
}

/**
 * Normalise whitespace and cut to `maxChars`, ending at the last full stop
 * when it sits beyond 80% of the ceiling. Only the prompt-facing copy goes
 * through here.
 */
export function prepareContent(raw: string, maxChars: number): string {
  const content = raw
    .replace(/\n{3,}/g, "\n\n")
    .replace(/[ \t]+/g, " ")
    .trim();

  if (content.length <= maxChars) return content;

  const truncated = content.slice(0, maxChars);
  const lastPeriod = truncated.lastIndexOf(".");
  return lastPeriod > maxChars * 0.8 ? truncated.slice(0, lastPeriod + 1) : truncated;
}

async function settle<T>(task: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await task };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Runs summary, key points, Q&A and topics against the completion client
 * concurrently, validates each field independently and substitutes document
 * derived fallback content for any field that fails.
 */
export class EnrichmentService {
  private readonly config: EnrichmentConfig;
  private readonly logger: Logger;

  constructor(private readonly deps: EnrichmentDependencies) {
    this.config = { ...DEFAULT_ENRICHMENT, ...deps.config };
    this.logger = createChildLogger(deps.logger, { component: "enrichment" });
  }

  async enrich(document: RawDocument): Promise<EnrichmentResult> {
    const prepared = prepareContent(document.content, this.config.inputMaxChars);
    const completion = this.deps.completion;

    if (!completion) {
      this.logger.warn(
        { title: document.title },
        "No completion client configured, using fallback content",
      );
      return this.fallbackFrom(document, prepared, "stage_failure");
    }

    const controller = new AbortController();
    const budgetMs = 2 * this.config.callTimeoutMs;
    const timer = setTimeout(() => controller.abort(), budgetMs);
    const expired = new Promise<"timeout">((resolve) => {
      controller.signal.addEventListener("abort", () => resolve("timeout"), { once: true });
    });

    const ask = (prompt: string): Promise<string> =>
      completion.complete(prompt, { signal: controller.signal });

    const tasks: Promise<Slots> = Promise.all([
      settle(this.generateSummary(ask, prepared, document.title)),
      settle(this.generateKeyPoints(ask, prepared)),
      settle(this.generateQa(ask, prepared)),
      settle(this.generateTopics(ask, prepared)),
    ]);

    let slots: Slots | "timeout";
    try {
      slots = await Promise.race([tasks, expired]);
    } finally {
      clearTimeout(timer);
    }

    if (slots === "timeout") {
      this.logger.warn(
        { title: document.title, budgetMs },
        "Enrichment deadline expired, using fallback content",
      );
      return this.fallbackFrom(document, prepared, "timeout");
    }

    const fallback = buildFallbackFields(document, prepared, this.config);
    const [summarySlot, keyPointsSlot, qaSlot, topicsSlot] = slots;
    const provenance: EnrichmentProvenance = {
      summary: "model",
      keyPoints: "model",
      qa: "model",
      topics: "model",
    };
    const pick = <T>(field: EnrichmentField, slot: Outcome<T>, substitute: T): T => {
      if (slot.ok) return slot.value;
      provenance[field] = "fallback";
      this.logger.warn({ field, err: errorMessage(slot.error) }, "Enrichment field fell back");
      return substitute;
    };

    const summary = pick("summary", summarySlot, fallback.summary);
    const keyPoints = pick("keyPoints", keyPointsSlot, fallback.keyPoints);
    const qa = pick("qa", qaSlot, { questions: fallback.questions, answers: fallback.answers });
    const topics = pick("topics", topicsSlot, fallback.topics);

    const fields = { summary, keyPoints, ...qa, topics };
    const result = createEnrichmentResult({
      ...fields,
      qualityScore: scoreEnrichment(fields, provenance),
      provenance,
      model: Object.values(provenance).every((source) => source === "fallback")
        ? FALLBACK_MODEL
        : completion.model,
      degradedReason: "partial",
    });

    this.logger.info(
      { title: document.title, qualityScore: result.qualityScore, degraded: result.degraded },
      "Document enriched",
    );
    return result;
  }

  /** Whole-stage substitute; every field comes from the document itself. */
  fallback(document: RawDocument, reason: DegradedReason): EnrichmentResult {
    return this.fallbackFrom(
      document,
      prepareContent(document.content, this.config.inputMaxChars),
      reason,
    );
  }

  private fallbackFrom(
    document: RawDocument,
    prepared: string,
    reason: DegradedReason,
  ): EnrichmentResult {
    const fields: FallbackFields = buildFallbackFields(document, prepared, this.config);
    const provenance: EnrichmentProvenance = {
      summary: "fallback",
      keyPoints: "fallback",
      qa: "fallback",
      topics: "fallback",
    };
    return createEnrichmentResult({
      ...fields,
      qualityScore: scoreEnrichment(fields, provenance),
      provenance,
      model: FALLBACK_MODEL,
      degradedReason: reason,
    });
  }

  private async generateSummary(
    ask: (prompt: string) => Promise<string>,
    content: string,
    title: string,
  ): Promise<string> {
    const summary = cleanLlmOutput(
      await ask(summaryPrompt(content, title, this.config.maxSummaryWords)),
    );
    if (summary.length < MIN_SUMMARY_CHARS) {
      throw new EnhancementError(`Summary has ${String(summary.length)} characters`);
    }
    return summary;
  }

  private async generateKeyPoints(
    ask: (prompt: string) => Promise<string>,
    content: string,
  ): Promise<string[]> {
    const points = parseNumberedList(await ask(keyPointsPrompt(content, this.config.maxKeyPoints)));
    if (points.length < MIN_ITEMS) {
      throw new EnhancementError(`Only ${String(points.length)} key points parsed`);
    }
    return points.slice(0, this.config.maxKeyPoints);
  }

  private async generateQa(
    ask: (prompt: string) => Promise<string>,
    content: string,
  ): Promise<QaPairs> {
    const parsed = parseQaPairs(await ask(qaPrompt(content, this.config.numQaPairs)));
    const questions = parsed.questions.slice(0, this.config.numQaPairs);
    const answers = parsed.answers.slice(0, this.config.numQaPairs);
    if (questions.length < MIN_ITEMS) {
      throw new EnhancementError(`Only ${String(questions.length)} Q&A pairs parsed`);
    }
    const weak = questions.findIndex(
      (question, i) =>
        question.length < MIN_QUESTION_CHARS || (answers[i] ?? "").length < MIN_ANSWER_LENGTH,
    );
    if (weak !== -1) {
      throw new EnhancementError(`Q&A pair ${String(weak + 1)} is too short`);
    }
    return { questions, answers };
  }

  private async generateTopics(
    ask: (prompt: string) => Promise<string>,
    content: string,
  ): Promise<string[]> {
    const topics = parseTopicList(await ask(topicsPrompt(content, this.config.maxTopics)));
    if (topics.length < MIN_ITEMS) {
      throw new EnhancementError(`Only ${String(topics.length)} topics parsed`);
    }
    return topics.slice(0, this.config.maxTopics);
  }
}
