import type { FigureRef, TableRef } from "@quire/types";

export const UNTITLED = "Untitled Document";

/** Characters per estimated page. */
export const CHARS_PER_PAGE = 3000;

const TITLE_WORDS = 8;
const TABLE_SEPARATOR = /^\|(\s*:?-+:?\s*\|)+$/;
const TABLE_CAPTION = /^\**table\b/i;
const MARKDOWN_IMAGE = /!\[([^\]]*)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
const HTML_IMAGE = /<img\b[^>]*>/gi;

/**
 * First Markdown heading, otherwise the first eight words of the first line
 * longer than ten characters.
 */
export function deriveTitle(text: string): string {
  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.startsWith("#")) {
      const heading = line.replace(/^#+\s*/, "").trim();
      if (heading.length > 0) return heading;
    } else if (line.length > 10) {
      const words = line.split(/\s+/);
      const head = words.slice(0, TITLE_WORDS).join(" ");
      return words.length > TITLE_WORDS ? `${head}...` : head;
    }
  }
  return UNTITLED;
}

function splitRow(line: string): string[] {
  return line
    .trim()
    .replace(/^\|/, "")
    .replace(/\|$/, "")
    .split("|")
    .map((cell) => cell.trim());
}

function isTableRow(line: string | undefined): boolean {
  return line !== undefined && line.trim().startsWith("|");
}

function captionBefore(lines: string[], index: number): string {
  for (let i = index - 1; i >= 0; i--) {
    const line = lines[i]?.trim() ?? "";
    if (line.length === 0) continue;
    return TABLE_CAPTION.test(line) ? line.replace(/\*/g, "").trim() : "";
  }
  return "";
}

/** Markdown pipe tables: a header row, a `| --- |` separator, then body rows. */
export function extractTables(markdown: string): TableRef[] {
  const lines = markdown.split("\n");
  const tables: TableRef[] = [];

  let i = 0;
  while (i < lines.length) {
    const header = lines[i];
    const separator = lines[i + 1]?.trim() ?? "";

    if (header !== undefined && isTableRow(header) && TABLE_SEPARATOR.test(separator)) {
      const rows: string[][] = [];
      let j = i + 2;
      for (; j < lines.length; j++) {
        const row = lines[j];
        if (row === undefined || !isTableRow(row)) break;
        rows.push(splitRow(row));
      }
      tables.push({
        index: tables.length,
        caption: captionBefore(lines, i),
        headers: splitRow(header),
        rows,
      });
      i = j;
    } else {
      i++;
    }
  }

  return tables;
}

function attribute(tag: string, name: string): string {
  const match = new RegExp(`\\b${name}\\s*=\\s*"([^"]*)"`, "i").exec(tag);
  return match?.[1] ?? "";
}

/** Markdown images, plus `<img>` tags when the source is HTML. */
export function extractFigures(text: string, html = false): FigureRef[] {
  const figures: FigureRef[] = [];

  for (const match of text.matchAll(MARKDOWN_IMAGE)) {
    figures.push({ index: figures.length, caption: match[1] ?? "", source: match[2] ?? "" });
  }

  if (html) {
    for (const match of text.matchAll(HTML_IMAGE)) {
      const source = attribute(match[0], "src");
      if (source.length === 0) continue;
      figures.push({ index: figures.length, caption: attribute(match[0], "alt"), source });
    }
  }

  return figures;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function estimatePageCount(text: string): number {
  return Math.max(1, Math.ceil(text.length / CHARS_PER_PAGE));
}
