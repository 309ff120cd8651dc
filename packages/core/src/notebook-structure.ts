import type {
  DisplayContent,
  EnrichmentResult,
  NotebookCell,
  NotebookStructure,
  RawDocument,
} from "@quire/types";
import { formatCount } from "./text-utils.js";

export const PREVIEW_CHARS = 5000;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * nbformat-4 notebook with an overview cell and a preview of the first
 * {@link PREVIEW_CHARS} characters of the content.
 */
export function buildNotebook(
  document: RawDocument,
  enrichment: EnrichmentResult,
  processedAt: Date = new Date(),
): NotebookStructure {
  const overview = [
    `# ${document.title}\n\n`,
    `**Document processed:** ${formatTimestamp(processedAt)}  \n`,
    `**Content size:** ${formatCount(document.content.length)} characters  \n`,
    `**Quality score:** ${enrichment.qualityScore.toFixed(2)}/1.0\n\n`,
    "## Summary\n\n",
    enrichment.summary,
    "\n\n## Key Points\n\n",
    ...enrichment.keyPoints.map((point) => `- ${point}\n`),
    "\n## Topics Covered\n\n",
    ...enrichment.topics.map((topic) => `- ${topic}\n`),
    "\n## Questions & Answers\n\n",
    ...enrichment.questions.map(
      (question, i) => `**${question}**\n\n${enrichment.answers[i] ?? ""}\n\n`,
    ),
  ];

  return notebookShell(document, enrichment, processedAt, [
    { cell_type: "markdown", metadata: {}, source: overview },
    previewCell(document),
  ]);
}

/** Title, summary and preview only; stands in when the full layout fails. */
export function minimalNotebook(
  document: RawDocument,
  enrichment: EnrichmentResult,
  processedAt: Date = new Date(),
): NotebookStructure {
  return notebookShell(document, enrichment, processedAt, [
    { cell_type: "markdown", metadata: {}, source: [`# ${document.title}\n\n`, enrichment.summary] },
    previewCell(document),
  ]);
}

function previewCell(document: RawDocument): NotebookCell {
  const preview =
    document.content.slice(0, PREVIEW_CHARS) +
    (document.content.length > PREVIEW_CHARS ? "..." : "");
  return {
    cell_type: "markdown",
    metadata: {},
    source: ["## Full Document Content\n\n", preview],
  };
}

function notebookShell(
  document: RawDocument,
  enrichment: EnrichmentResult,
  processedAt: Date,
  cells: NotebookCell[],
): NotebookStructure {
  return {
    nbformat: 4,
    nbformat_minor: 4,
    metadata: {
      document_info: {
        title: document.title,
        processing_timestamp: processedAt.toISOString(),
        content_size: document.content.length,
        enhancement_quality: enrichment.qualityScore,
      },
    },
    cells,
  };
}

export function formatQa(questions: readonly string[], answers: readonly string[]): string {
  return questions
    .map((question, i) => `**${question}**\n\n${answers[i] ?? ""}`)
    .join("\n\n")
    .trim();
}

export function formatHighlights(keyPoints: readonly string[]): string {
  if (keyPoints.length === 0) {
    return "## Key Highlights\n\n- Document processed successfully";
  }
  return `## Key Highlights\n\n${keyPoints.map((point) => `- ${point}\n`).join("")}`.trim();
}

export function buildDisplay(enrichment: EnrichmentResult): DisplayContent {
  return {
    summary: enrichment.summary.trim(),
    qa: formatQa(enrichment.questions, enrichment.answers),
    highlights: formatHighlights(enrichment.keyPoints),
  };
}
