import type { EnrichmentProvenance, FieldSource } from "@quire/types";

export interface ScoredFields {
  summary: string;
  keyPoints: readonly string[];
  questions: readonly string[];
  answers: readonly string[];
}

const FALLBACK_WEIGHT = 0.5;

function weight(source: FieldSource): number {
  return source === "fallback" ? FALLBACK_WEIGHT : 1;
}

/**
 * Structural quality in [0, 1], rounded to two decimals.
 *
 * Summary: up to 0.4 (length >= 100, >= 50 words). Key points: up to 0.3
 * (>= 5 points, every point >= 20 chars). Q&A: up to 0.3 (>= 3 pairs, every
 * answer >= 30 chars). Fields supplied by fallback content earn half.
 */
export function scoreEnrichment(fields: ScoredFields, provenance: EnrichmentProvenance): number {
  let summary = 0;
  if (fields.summary.length >= 100) summary += 0.2;
  if (fields.summary.split(/\s+/).filter(Boolean).length >= 50) summary += 0.2;

  let keyPoints = 0;
  if (fields.keyPoints.length >= 5) keyPoints += 0.15;
  if (fields.keyPoints.every((point) => point.length >= 20)) keyPoints += 0.15;

  let qa = 0;
  if (fields.questions.length >= 3) qa += 0.15;
  if (fields.answers.every((answer) => answer.length >= 30)) qa += 0.15;

  const score =
    summary * weight(provenance.summary) +
    keyPoints * weight(provenance.keyPoints) +
    qa * weight(provenance.qa);

  return Math.min(1, Math.round(score * 100) / 100);
}
