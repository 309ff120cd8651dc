import { describe, it, expect } from "vitest";
import { WhitespaceChunker } from "./whitespace-chunker.js";

const chunker = new WhitespaceChunker();

function normalise(text: string): string {
  return text.split(/\s+/).filter((t) => t.length > 0).join(" ");
}

describe("WhitespaceChunker", () => {
  it("has strategy 'whitespace'", () => {
    expect(chunker.strategy).toBe("whitespace");
  });

  it("keeps a short repeated sentence in one chunk", () => {
    const content = "Alpha Beta Gamma. ".repeat(50);
    const results = chunker.chunk(content, { maxChars: 3000 });

    expect(results).toHaveLength(1);
    expect(results[0]!.text).toBe(content.trim());
    expect(results[0]!.charCount).toBe(899);
    expect(results[0]!.index).toBe(0);
  });

  it("splits a 10,000 character document into four chunks", () => {
    const content = [...Array<string>(1999).fill("wxyz"), "wxyzq"].join(" ");
    expect(content).toHaveLength(10_000);

    const results = chunker.chunk(content, { maxChars: 3000 });

    expect(results.map((r) => r.charCount)).toEqual([2999, 2999, 2999, 1000]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2, 3]);
    expect(results.map((r) => r.text).join(" ")).toBe(content);
  });

  it("round-trips whitespace-normalised content", () => {
    const content = "  The survey\n\ncovered\tforty  sites.\nEach site had three plots.  ";
    const results = chunker.chunk(content, { maxChars: 20 });

    expect(results.map((r) => r.text).join(" ")).toBe(normalise(content));
    for (const result of results) {
      expect(result.text.length).toBeLessThanOrEqual(20);
    }
  });

  it("closes a chunk as soon as it reaches the ceiling", () => {
    const results = chunker.chunk("abcd efghi jk", { maxChars: 10 });
    expect(results.map((r) => r.text)).toEqual(["abcd efghi", "jk"]);
  });

  it("gives an oversized token a chunk of its own", () => {
    const long = "a".repeat(50);
    const results = chunker.chunk(`x ${long} y`, { maxChars: 10 });
    expect(results.map((r) => r.text)).toEqual(["x", long, "y"]);
  });

  it("uses the default ceiling of 3000", () => {
    const results = chunker.chunk("word ".repeat(1000));
    expect(results.map((r) => r.charCount)).toEqual([2999, 1999]);
  });

  it("returns nothing for empty or blank content", () => {
    expect(chunker.chunk("", { maxChars: 100 })).toEqual([]);
    expect(chunker.chunk(" \n\t ", { maxChars: 100 })).toEqual([]);
  });

  it("rejects a non-positive ceiling", () => {
    expect(() => chunker.chunk("text", { maxChars: 0 })).toThrow(RangeError);
  });
});
