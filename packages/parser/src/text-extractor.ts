import { readFile, stat } from "node:fs/promises";
import { basename, extname } from "node:path";
import type { ExtractedDocument } from "@quire/types";
import { ExtractionError, errorMessage } from "@quire/errors";
import type { IExtractor } from "./extractor.interface.js";
import {
  countWords,
  deriveTitle,
  estimatePageCount,
  extractFigures,
  extractTables,
} from "./markdown-structure.js";

const TEXT_EXTENSIONS = [".txt", ".md", ".markdown", ".html", ".htm", ".csv", ".json"];
const HTML_EXTENSIONS = new Set([".html", ".htm"]);

/**
 * Plain text, Markdown and HTML extractor.
 * Handles text-based formats directly without external dependencies.
 */
export class TextExtractor implements IExtractor {
  readonly supportedExtensions = TEXT_EXTENSIONS;

  async extract(filePath: string): Promise<ExtractedDocument> {
    let raw: string;
    let sizeBytes: number;
    try {
      const [buffer, info] = await Promise.all([readFile(filePath), stat(filePath)]);
      raw = new TextDecoder().decode(buffer);
      sizeBytes = info.size;
    } catch (err) {
      throw new ExtractionError(`Failed to read ${filePath}: ${errorMessage(err)}`, filePath, {
        cause: err,
      });
    }

    const extension = extname(filePath).toLowerCase();
    const isHtml = HTML_EXTENSIONS.has(extension);
    const content = isHtml ? this.stripHtml(raw) : raw;
    const title = (isHtml ? this.htmlTitle(raw) : undefined) ?? deriveTitle(content);

    return {
      title,
      content,
      tables: isHtml ? [] : extractTables(raw),
      figures: extractFigures(raw, isHtml),
      metadata: {
        filename: basename(filePath),
        extension,
        sizeBytes,
        charCount: content.length,
        wordCount: countWords(content),
        pageCount: estimatePageCount(content),
        extractor: "text",
      },
    };
  }

  private htmlTitle(html: string): string | undefined {
    const title = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)?.[1]?.trim();
    return title !== undefined && title.length > 0 ? title : undefined;
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<title[^>]*>[\s\S]*?<\/title>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/\s+/g, " ")
      .trim();
  }
}
