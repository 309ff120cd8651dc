import { spawn } from "node:child_process";
import { basename, extname } from "node:path";
import { z } from "zod";
import type { ExtractedDocument } from "@quire/types";
import { ExtractionError } from "@quire/errors";
import type { IExtractor } from "./extractor.interface.js";
import { countWords, deriveTitle, estimatePageCount } from "./markdown-structure.js";

const DOCLING_EXTENSIONS = [".pdf", ".docx", ".pptx", ".xlsx"];

const doclingOutputSchema = z.object({
  title: z.string().nullish(),
  content: z.string(),
  page_count: z.number().int().nonnegative().nullish(),
  metadata: z.record(z.unknown()).default({}),
  tables: z
    .array(
      z.object({
        caption: z.string().default(""),
        headers: z.array(z.string()).default([]),
        rows: z.array(z.array(z.string())).default([]),
      }),
    )
    .default([]),
  figures: z
    .array(
      z.object({
        caption: z.string().default(""),
        source: z.string().default(""),
      }),
    )
    .default([]),
});

/**
 * Validate the bridge script's stdout and map it onto an ExtractedDocument.
 */
export function parseDoclingOutput(stdout: string, filePath: string): ExtractedDocument {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (err) {
    throw new ExtractionError(`Docling output is not JSON for ${filePath}`, filePath, {
      cause: err,
    });
  }

  const parsed = doclingOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExtractionError(`Unexpected Docling output for ${filePath}`, filePath, {
      details: { issues: parsed.error.issues },
    });
  }

  const result = parsed.data;
  const title = result.title?.trim();

  return {
    title: title !== undefined && title.length > 0 ? title : deriveTitle(result.content),
    content: result.content,
    tables: result.tables.map((table, index) => ({ index, ...table })),
    figures: result.figures.map((figure, index) => ({ index, ...figure })),
    metadata: {
      ...result.metadata,
      filename: basename(filePath),
      extension: extname(filePath).toLowerCase(),
      charCount: result.content.length,
      wordCount: countWords(result.content),
      pageCount: result.page_count ?? estimatePageCount(result.content),
      extractor: "docling",
    },
  };
}

/**
 * Python bridge to Docling for PDF/DOCX/PPTX/XLSX extraction.
 * Spawns a Python child process that prints one JSON document on stdout.
 */
export class DoclingExtractor implements IExtractor {
  readonly supportedExtensions = DOCLING_EXTENSIONS;
  private pythonPath: string;
  private scriptPath: string;

  constructor(pythonPath = "python3", scriptPath = "scripts/docling-extract.py") {
    this.pythonPath = pythonPath;
    this.scriptPath = scriptPath;
  }

  async extract(filePath: string): Promise<ExtractedDocument> {
    const stdout = await new Promise<string>((resolve, reject) => {
      const child = spawn(this.pythonPath, [this.scriptPath, filePath]);

      let out = "";
      let stderr = "";

      child.stdout.on("data", (data: Buffer) => {
        out += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (code !== 0) {
          reject(
            new ExtractionError(
              `Docling extractor exited with code ${String(code)}: ${stderr.trim()}`,
              filePath,
            ),
          );
          return;
        }
        resolve(out);
      });

      child.on("error", (err) => {
        reject(
          new ExtractionError(`Failed to spawn Docling process: ${err.message}`, filePath, {
            cause: err,
          }),
        );
      });
    });

    return parseDoclingOutput(stdout, filePath);
  }
}
