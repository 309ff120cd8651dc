import { describe, it, expect, vi } from "vitest";
import type { ICompletionClient } from "@quire/completions";
import type { IEmbeddingProvider } from "@quire/embeddings";
import { createLogger } from "@quire/logger";
import { InMemoryDocumentRepository } from "@quire/store";
import type { Chunk, ScoredChunk, StoredDocument } from "@quire/types";
import { bestSnippet, RetrievalEngine } from "./retrieval-engine.js";

const logger = createLogger({ level: "silent" });

const CONTENT = "Loam soils drain well and hold nutrients. Clay soils compact easily. Sand warms fast.";

function makeDocument(overrides: Partial<StoredDocument> = {}): StoredDocument {
  return {
    id: "doc-1",
    title: "Soil Survey",
    content: CONTENT,
    summary: "A survey of common garden soils.",
    keyPoints: [],
    questions: [],
    answers: [],
    topics: [],
    qAndA: "",
    bulletPoints: "",
    mindMap: null,
    notebook: null,
    metadata: {},
    tables: [],
    figures: [],
    summaryEmbedding: null,
    qualityScore: 0.5,
    isProcessed: true,
    processingError: null,
    sourcePath: "/docs/soil.md",
    createdAt: new Date("2024-05-01T00:00:00Z"),
    updatedAt: new Date("2024-05-01T00:00:00Z"),
    ...overrides,
  };
}

function makeChunk(embedding: number[] | null, text = "Loam soils drain well and hold nutrients."): Chunk {
  return {
    id: "chunk-0",
    documentId: "doc-1",
    text,
    index: 0,
    kind: "content",
    embedding,
    createdAt: new Date("2024-05-01T00:00:00Z"),
  };
}

function fakeEmbeddings(vector: number[]): IEmbeddingProvider {
  return {
    name: "fake",
    dimensions: vector.length,
    embed: async () => ({ embeddings: [vector], model: "fake", tokensUsed: 1, dimensions: vector.length }),
    batchEmbed: async (texts) => ({
      embeddings: texts.map(() => vector),
      model: "fake",
      tokensUsed: texts.length,
      dimensions: vector.length,
    }),
    healthCheck: async () => true,
  };
}

function fakeCompletion(complete: ICompletionClient["complete"]): ICompletionClient {
  return { name: "fake", model: "fake-model", complete, healthCheck: async () => true };
}

async function seededRepository(document: StoredDocument, chunks: Chunk[]) {
  const repository = new InMemoryDocumentRepository();
  await repository.replaceDocument(document, chunks);
  return repository;
}

describe("RetrievalEngine", () => {
  it("returns null for a blank question", async () => {
    const engine = new RetrievalEngine({
      repository: new InMemoryDocumentRepository(),
      embeddings: null,
      completion: null,
      logger,
    });

    expect(await engine.query("   ")).toBeNull();
  });

  it("returns null when nothing is stored", async () => {
    const engine = new RetrievalEngine({
      repository: new InMemoryDocumentRepository(),
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: null,
      logger,
    });

    expect(await engine.query("What is this about?")).toBeNull();
  });

  it("answers from matching chunks in the vector tier", async () => {
    const repository = await seededRepository(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: null,
      logger,
    });

    const answer = await engine.query("How do loam soils drain?");

    expect(answer).toEqual({
      tier: "vector",
      text: "Loam soils drain well and hold nutrients.",
      citations: [
        {
          documentId: "doc-1",
          title: "Soil Survey",
          score: 1,
          chunkIndex: 0,
          excerpt: "Loam soils drain well and hold nutrients.",
        },
      ],
      markdown:
        "## Answer\n\nLoam soils drain well and hold nutrients.\n\n## Sources\n\n- Soil Survey, chunk 0 (similarity: 1.00)",
    });
  });

  it("synthesises the answer over numbered context when a completion client is configured", async () => {
    const complete = vi.fn<ICompletionClient["complete"]>(async () => "  Loam drains well [1].  ");
    const repository = await seededRepository(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: fakeCompletion(complete),
      logger,
    });

    const answer = await engine.query("How do loam soils drain?");

    expect(answer?.text).toBe("Loam drains well [1].");
    expect(complete.mock.calls[0]?.[0]).toContain(
      "[1] (Source: Soil Survey)\nLoam soils drain well and hold nutrients.",
    );
  });

  it("lays out the synthesis context in the configured format", async () => {
    const complete = vi.fn<ICompletionClient["complete"]>(async () => "Loam drains well.");
    const repository = await seededRepository(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: fakeCompletion(complete),
      config: { contextFormat: "xml" },
      logger,
    });

    await engine.query("How do loam soils drain?");

    expect(complete.mock.calls[0]?.[0]).toContain(
      '<context>\n<document index="1" source="Soil Survey">\nLoam soils drain well and hold nutrients.\n</document>\n</context>',
    );
  });

  it("returns the passages when synthesis fails", async () => {
    const repository = await seededRepository(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: fakeCompletion(async () => {
        throw new Error("circuit open");
      }),
      logger,
    });

    const answer = await engine.query("How do loam soils drain?");

    expect(answer?.tier).toBe("vector");
    expect(answer?.text).toBe("Loam soils drain well and hold nutrients.");
  });

  it("falls through to keyword overlap when no chunk clears the threshold", async () => {
    const repository = await seededRepository(makeDocument(), [makeChunk([0, 1, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: null,
      logger,
    });

    const answer = await engine.query("How do loam soils drain?");

    expect(answer?.tier).toBe("lexical");
    expect(answer?.text).toBe("Loam soils drain well and hold nutrients. Clay soils compact easily.");
    expect(answer?.citations).toEqual([
      {
        documentId: "doc-1",
        title: "Soil Survey",
        score: 1,
        excerpt: "Loam soils drain well and hold nutrients. Clay soils compact easily.",
      },
    ]);
  });

  it("skips documents whose summary embedding is too far from the query", async () => {
    const repository = await seededRepository(makeDocument({ summaryEmbedding: [0, 1, 0] }), [
      makeChunk(null),
    ]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: null,
      logger,
    });

    const answer = await engine.query("Clay soils compact");

    expect(answer?.tier).toBe("substring");
    expect(answer?.text).toBe("A survey of common garden soils.");
    expect(answer?.markdown).toBe(
      "## Answer\n\nA survey of common garden soils.\n\n## Sources\n\n- Soil Survey (similarity: 1.00)",
    );
  });

  it("uses keyword overlap when no embedding client is configured", async () => {
    const repository = await seededRepository(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({ repository, embeddings: null, completion: null, logger });

    expect((await engine.query("Which soils compact?"))?.tier).toBe("lexical");
  });

  it("treats a failing repository call as a miss and moves on", async () => {
    class FlakyRepository extends InMemoryDocumentRepository {
      override async similaritySearch(_vector: number[], _k: number): Promise<ScoredChunk[]> {
        throw new Error("index offline");
      }
    }
    const repository = new FlakyRepository();
    await repository.replaceDocument(makeDocument(), [makeChunk([1, 0, 0])]);
    const engine = new RetrievalEngine({
      repository,
      embeddings: fakeEmbeddings([1, 0, 0]),
      completion: null,
      logger,
    });

    expect((await engine.query("How do loam soils drain?"))?.tier).toBe("lexical");
  });
});

describe("bestSnippet", () => {
  it("orders sentences by overlap and stops at the limit", () => {
    const tokens = new Set(["clay", "soils"]);

    expect(bestSnippet(CONTENT, tokens, 30)).toBe("Clay soils compact easily.");
  });

  it("truncates a single sentence longer than the limit", () => {
    expect(bestSnippet(CONTENT, new Set(["loam"]), 20)).toBe("Loam soils drain...");
  });
});
