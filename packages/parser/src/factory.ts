import { extname } from "node:path";
import type { ExtractedDocument, ExtractionConfig } from "@quire/types";
import type { IExtractor } from "./extractor.interface.js";
import { TextExtractor } from "./text-extractor.js";
import { DoclingExtractor } from "./docling-extractor.js";

/**
 * Routes each file to the extractor registered for its extension.
 * Unknown extensions go to the fallback (plain text by default).
 */
export class CompositeExtractor implements IExtractor {
  readonly supportedExtensions: string[];

  constructor(
    private readonly extractors: IExtractor[],
    private readonly fallback: IExtractor = new TextExtractor(),
  ) {
    this.supportedExtensions = extractors.flatMap((e) => e.supportedExtensions);
  }

  select(filePath: string): IExtractor {
    const extension = extname(filePath).toLowerCase();
    return this.extractors.find((e) => e.supportedExtensions.includes(extension)) ?? this.fallback;
  }

  extract(filePath: string): Promise<ExtractedDocument> {
    return this.select(filePath).extract(filePath);
  }
}

export function createExtractor(
  config: Pick<ExtractionConfig, "doclingPython" | "doclingScript">,
): CompositeExtractor {
  const text = new TextExtractor();
  return new CompositeExtractor(
    [text, new DoclingExtractor(config.doclingPython, config.doclingScript)],
    text,
  );
}
