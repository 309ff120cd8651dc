export type RetrievalTier = "vector" | "lexical" | "substring";

export interface Citation {
  documentId: string;
  title: string;
  score: number;
  chunkIndex?: number;
  excerpt: string;
}

export interface Answer {
  tier: RetrievalTier;
  text: string;
  citations: Citation[];
  /** `## Answer` / `## Sources` rendering of the same answer. */
  markdown: string;
}

/** Layout of the retrieved passages handed to answer synthesis. */
export type ContextFormat = "plain" | "markdown" | "xml";

export interface RetrievalConfig {
  topK: number;
  vectorScoreThreshold: number;
  documentSimilarityThreshold: number;
  keywordOverlapRatio: number;
  snippetMaxChars: number;
  synthesizeAnswers: boolean;
  contextFormat: ContextFormat;
}
