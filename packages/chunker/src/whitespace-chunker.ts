import type { ChunkResult, ChunkingConfig } from "@quire/types";
import type { IChunker } from "./chunker.interface.js";

export const DEFAULT_CHUNKING: ChunkingConfig = { maxChars: 3000 };

/**
 * Greedy whitespace chunker.
 *
 * Tokens are appended to the current chunk until the chunk, joined by single
 * spaces, reaches `maxChars`. A token that would push the chunk past the
 * ceiling starts a new one; a single token longer than the ceiling becomes a
 * chunk of its own. No overlap, so joining every chunk with single spaces
 * gives back the whitespace-normalised input.
 */
export class WhitespaceChunker implements IChunker {
  readonly strategy = "whitespace";

  chunk(content: string, config: ChunkingConfig = DEFAULT_CHUNKING): ChunkResult[] {
    const { maxChars } = config;
    if (!Number.isInteger(maxChars) || maxChars <= 0) {
      throw new RangeError(`maxChars must be a positive integer, got ${String(maxChars)}`);
    }

    const results: ChunkResult[] = [];
    let current: string[] = [];
    let currentLength = 0;

    const flush = (): void => {
      if (current.length === 0) return;
      const text = current.join(" ");
      results.push({ text, index: results.length, charCount: text.length });
      current = [];
      currentLength = 0;
    };

    for (const token of content.split(/\s+/)) {
      if (token.length === 0) continue;

      if (current.length > 0 && currentLength + 1 + token.length > maxChars) {
        flush();
      }

      currentLength += (current.length > 0 ? 1 : 0) + token.length;
      current.push(token);

      if (currentLength >= maxChars) {
        flush();
      }
    }

    flush();
    return results;
  }
}
