export type FieldSource = "model" | "fallback";

export type EnrichmentField = "summary" | "keyPoints" | "qa" | "topics";

export type EnrichmentProvenance = Record<EnrichmentField, FieldSource>;

export type DegradedReason = "timeout" | "stage_failure" | "partial";

export interface EnrichmentResult {
  readonly summary: string;
  readonly keyPoints: readonly string[];
  readonly questions: readonly string[];
  readonly answers: readonly string[];
  readonly topics: readonly string[];
  /** Structural score in [0, 1]; never reported by the model. */
  readonly qualityScore: number;
  readonly provenance: Readonly<EnrichmentProvenance>;
  readonly model: string;
  readonly degraded: boolean;
  readonly degradedReason?: DegradedReason;
}

export interface EnrichmentConfig {
  maxSummaryWords: number;
  numQaPairs: number;
  maxKeyPoints: number;
  maxTopics: number;
  /** Ceiling for the prompt-facing copy of the content. */
  inputMaxChars: number;
  /** Per-call completion timeout; the four sub-tasks share twice this. */
  callTimeoutMs: number;
}
