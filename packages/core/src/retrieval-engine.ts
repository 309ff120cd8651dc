import type { ICompletionClient } from "@quire/completions";
import type { IEmbeddingProvider } from "@quire/embeddings";
import { errorMessage } from "@quire/errors";
import { createChildLogger, type Logger } from "@quire/logger";
import { cosineSimilarity, type IDocumentRepository } from "@quire/store";
import type {
  Answer,
  Citation,
  RetrievalConfig,
  RetrievalTier,
  ScoredChunk,
  StoredDocument,
} from "@quire/types";
import { assembleContext } from "./context-assembler.js";
import { answerPrompt } from "./prompts.js";
import { significantTokens, splitSentences, truncateText } from "./text-utils.js";

export const DEFAULT_RETRIEVAL: RetrievalConfig = {
  topK: 5,
  vectorScoreThreshold: 0.3,
  documentSimilarityThreshold: 0.6,
  keywordOverlapRatio: 0.2,
  snippetMaxChars: 600,
  synthesizeAnswers: true,
  contextFormat: "plain",
};

const LEXICAL_MATCHES = 3;
const SUBSTRING_MATCHES = 3;
const EXCERPT_CHARS = 200;

export interface RetrievalDependencies {
  repository: IDocumentRepository;
  embeddings: IEmbeddingProvider | null;
  completion: ICompletionClient | null;
  logger: Logger;
  config?: Partial<RetrievalConfig>;
}

/** Render an answer as `## Answer` followed by a `## Sources` list. */
export function formatAnswerMarkdown(text: string, citations: Citation[]): string {
  const sources = citations.map((citation) => {
    const chunk = citation.chunkIndex === undefined ? "" : `, chunk ${String(citation.chunkIndex)}`;
    return `- ${citation.title}${chunk} (similarity: ${citation.score.toFixed(2)})`;
  });
  return `## Answer\n\n${text}\n\n## Sources\n\n${sources.join("\n")}`;
}

/**
 * Best sentences of `content` by overlap with `tokens`, joined in score order
 * until `maxChars` would be exceeded.
 */
export function bestSnippet(content: string, tokens: ReadonlySet<string>, maxChars: number): string {
  const scored = splitSentences(content)
    .map((sentence) => ({
      sentence,
      score: new Set(significantTokens(sentence).filter((t) => tokens.has(t))).size,
    }))
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score);

  let snippet = "";
  for (const { sentence } of scored) {
    const next = snippet ? `${snippet} ${sentence}` : sentence;
    if (next.length > maxChars) {
      if (!snippet) snippet = truncateText(sentence, maxChars);
      break;
    }
    snippet = next;
  }
  return snippet;
}

/**
 * Answers questions from stored documents in three tiers, stopping at the
 * first that produces anything: chunk vector search, keyword overlap over
 * candidate documents, then a plain substring match. A tier whose
 * collaborators fail counts as a miss.
 */
export class RetrievalEngine {
  private readonly config: RetrievalConfig;
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalDependencies) {
    this.config = { ...DEFAULT_RETRIEVAL, ...deps.config };
    this.logger = createChildLogger(deps.logger, { component: "retrieval" });
  }

  async query(question: string): Promise<Answer | null> {
    const trimmed = question.trim();
    if (!trimmed) return null;

    const queryVector = await this.embedQuery(trimmed);

    return (
      (await this.attempt("vector", () => this.vectorTier(trimmed, queryVector))) ??
      (await this.attempt("lexical", () => this.lexicalTier(trimmed, queryVector))) ??
      (await this.attempt("substring", () => this.substringTier(trimmed)))
    );
  }

  private async attempt(
    tier: RetrievalTier,
    run: () => Promise<Answer | null>,
  ): Promise<Answer | null> {
    try {
      const answer = await run();
      this.logger.debug({ tier, hit: answer !== null }, "Retrieval tier finished");
      return answer;
    } catch (err) {
      this.logger.warn({ tier, err: errorMessage(err) }, "Retrieval tier failed, treating as a miss");
      return null;
    }
  }

  private async embedQuery(question: string): Promise<number[] | null> {
    const provider = this.deps.embeddings;
    if (!provider) return null;
    try {
      const result = await provider.embed(question, "query");
      return result.embeddings[0] ?? null;
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Query embedding failed");
      return null;
    }
  }

  private async vectorTier(question: string, queryVector: number[] | null): Promise<Answer | null> {
    if (!queryVector || !this.deps.repository.supportsVectorSearch) return null;

    const hits = (await this.deps.repository.similaritySearch(queryVector, this.config.topK)).filter(
      (hit) => hit.score >= this.config.vectorScoreThreshold,
    );
    if (hits.length === 0) return null;

    const text =
      (await this.synthesize(question, hits)) ?? hits.map((hit) => hit.text).join("\n\n");
    const citations = hits.map(
      (hit): Citation => ({
        documentId: hit.documentId,
        title: hit.documentTitle,
        score: hit.score,
        chunkIndex: hit.index,
        excerpt: truncateText(hit.text, EXCERPT_CHARS),
      }),
    );
    return this.answer("vector", text, citations);
  }

  private async lexicalTier(question: string, queryVector: number[] | null): Promise<Answer | null> {
    const tokens = new Set(significantTokens(question));
    if (tokens.size === 0) return null;
    const required = Math.max(1, tokens.size * this.config.keywordOverlapRatio);

    const documents = await this.deps.repository.listDocuments();
    const matches: { document: StoredDocument; overlap: number }[] = [];

    for (const document of documents) {
      if (
        queryVector &&
        document.summaryEmbedding &&
        cosineSimilarity(queryVector, document.summaryEmbedding) <
          this.config.documentSimilarityThreshold
      ) {
        continue;
      }
      const words = new Set(significantTokens(`${document.summary} ${document.content}`));
      const overlap = [...tokens].filter((token) => words.has(token)).length;
      if (overlap >= required) matches.push({ document, overlap });
    }
    if (matches.length === 0) return null;

    const top = matches.sort((a, b) => b.overlap - a.overlap).slice(0, LEXICAL_MATCHES);
    const parts = top.map(({ document, overlap }) => {
      const snippet =
        bestSnippet(document.content, tokens, this.config.snippetMaxChars) ||
        truncateText(document.summary, this.config.snippetMaxChars);
      const citation: Citation = {
        documentId: document.id,
        title: document.title,
        score: overlap / tokens.size,
        excerpt: truncateText(snippet, EXCERPT_CHARS),
      };
      return { snippet, citation };
    });

    return this.answer(
      "lexical",
      parts.map((part) => part.snippet).join("\n\n"),
      parts.map((part) => part.citation),
    );
  }

  private async substringTier(question: string): Promise<Answer | null> {
    const documents = await this.deps.repository.textSearch(question, SUBSTRING_MATCHES);
    if (documents.length === 0) return null;

    const citations = documents.map(
      (document): Citation => ({
        documentId: document.id,
        title: document.title,
        score: 1,
        excerpt: excerptAround(document.content, question),
      }),
    );
    return this.answer(
      "substring",
      documents.map((document) => document.summary).join("\n\n"),
      citations,
    );
  }

  private async synthesize(question: string, hits: ScoredChunk[]): Promise<string | null> {
    const completion = this.deps.completion;
    if (!completion || !this.config.synthesizeAnswers) return null;

    try {
      const context = assembleContext(hits, this.config.contextFormat);
      const text = (await completion.complete(answerPrompt(question, context))).trim();
      return text || null;
    } catch (err) {
      this.logger.warn({ err: errorMessage(err) }, "Answer synthesis failed, returning passages");
      return null;
    }
  }

  private answer(tier: RetrievalTier, text: string, citations: Citation[]): Answer {
    this.logger.info({ tier, sources: citations.length }, "Question answered");
    return { tier, text, citations, markdown: formatAnswerMarkdown(text, citations) };
  }
}

function excerptAround(content: string, needle: string): string {
  const at = content.toLowerCase().indexOf(needle.toLowerCase());
  const start = Math.max(0, at - EXCERPT_CHARS / 4);
  return truncateText(content.slice(start).trim(), EXCERPT_CHARS);
}
