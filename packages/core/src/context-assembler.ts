import type { ContextFormat, ScoredChunk } from "@quire/types";

export type { ContextFormat };

/**
 * Lay retrieved chunks out as a numbered context block for answer synthesis.
 *
 * - plain: `[n] (Source: title)` sections
 * - markdown: `### Source n (title)` sections separated by rules
 * - xml: `<document index source>` elements inside `<context>`
 */
export function assembleContext(chunks: ScoredChunk[], format: ContextFormat = "plain"): string {
  if (chunks.length === 0) return "";

  switch (format) {
    case "xml":
      return assembleXml(chunks);
    case "markdown":
      return assembleMarkdown(chunks);
    case "plain":
      return assemblePlain(chunks);
  }
}

function assembleXml(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) =>
      `<document index="${String(i + 1)}" source="${escapeAttribute(chunk.documentTitle)}">\n${chunk.text}\n</document>`,
  );

  return `<context>\n${parts.join("\n")}\n</context>`;
}

function assembleMarkdown(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `### Source ${String(i + 1)} (${chunk.documentTitle})\n\n${chunk.text}`,
  );

  return `## Retrieved Context\n\n${parts.join("\n\n---\n\n")}`;
}

function assemblePlain(chunks: ScoredChunk[]): string {
  const parts = chunks.map(
    (chunk, i) => `[${String(i + 1)}] (Source: ${chunk.documentTitle})\n${chunk.text}`,
  );

  return parts.join("\n\n");
}

function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");
}
