import { readFileSync } from "node:fs";
import { z } from "zod";
import type { RawDocument } from "@quire/types";
import { MIN_ITEMS } from "./events.js";
import {
  collapseWhitespace,
  formatCount,
  significantTokens,
  splitSentences,
  truncateText,
} from "./text-utils.js";

const STOPWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL("../data/stopwords.json", import.meta.url), "utf8"))),
);

const DEFAULT_TOPICS = ["Main Content", "Key Information", "Document Analysis"];

const MIN_POINT_CHARS = 30;
const MAX_POINT_CHARS = 300;
const MAX_FALLBACK_POINTS = 5;
const SUMMARY_LEAD_CHARS = 600;

export interface FallbackFields {
  summary: string;
  keyPoints: string[];
  questions: string[];
  answers: string[];
  topics: string[];
}

export interface FallbackLimits {
  maxKeyPoints: number;
  maxTopics: number;
}

/** The title, then the first three sentences of the prepared content. */
export function fallbackSummary(prepared: string, title: string): string {
  const lead = truncateText(
    collapseWhitespace(prepared).split(". ").slice(0, 3).join(". "),
    SUMMARY_LEAD_CHARS,
  ).replace(/\.+$/, "");

  return `This document titled '${title}' contains important information and insights. ${lead}. The document has been processed and is ready for analysis and exploration.`;
}

/**
 * Leading sentences of a readable length, padded with facts about the
 * document until there are at least three.
 */
export function fallbackKeyPoints(prepared: string, document: RawDocument, max: number): string[] {
  const points = splitSentences(collapseWhitespace(prepared))
    .filter((s) => s.length >= MIN_POINT_CHARS && s.length <= MAX_POINT_CHARS)
    .slice(0, Math.max(MIN_ITEMS, Math.min(max, MAX_FALLBACK_POINTS)));

  const facts = [
    `'${document.title}' contains ${formatCount(document.content.length)} characters of content`,
    `The document runs to ${formatCount(wordCount(document.content))} words`,
    "The full text is preserved and available for querying",
  ];
  for (const fact of facts) {
    if (points.length >= MIN_ITEMS) break;
    points.push(fact);
  }
  return points;
}

export function fallbackQa(document: RawDocument): { questions: string[]; answers: string[] } {
  return {
    questions: [
      `What is '${document.title}' about?`,
      "What are the main points of this document?",
      "How much content does this document contain?",
    ],
    answers: [
      `This document, titled '${document.title}', has been processed and its full content is available for exploration.`,
      "The key points section lists the leading statements taken directly from the document text.",
      `The document contains ${formatCount(document.content.length)} characters across ${formatCount(wordCount(document.content))} words.`,
    ],
  };
}

/**
 * Most frequent significant words, capitalised. Ties keep first-occurrence
 * order. Padded with generic topics up to three.
 */
export function fallbackTopics(prepared: string, max: number): string[] {
  const counts = new Map<string, number>();
  for (const token of significantTokens(prepared)) {
    if (STOPWORDS.has(token) || /^\p{N}+$/u.test(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }

  const topics = [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, Math.max(MIN_ITEMS, max))
    .map(([word]) => word.charAt(0).toUpperCase() + word.slice(1));

  for (const topic of DEFAULT_TOPICS) {
    if (topics.length >= MIN_ITEMS) break;
    if (!topics.some((t) => t.toLowerCase() === topic.toLowerCase())) topics.push(topic);
  }
  return topics;
}

export function buildFallbackFields(
  document: RawDocument,
  prepared: string,
  limits: FallbackLimits,
): FallbackFields {
  return {
    summary: fallbackSummary(prepared, document.title),
    keyPoints: fallbackKeyPoints(prepared, document, limits.maxKeyPoints),
    ...fallbackQa(document),
    topics: fallbackTopics(prepared, limits.maxTopics),
  };
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}
