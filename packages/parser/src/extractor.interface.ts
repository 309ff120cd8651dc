import type { ExtractedDocument } from "@quire/types";

export interface IExtractor {
  /** Lower-case file extensions including the dot, e.g. ".md". */
  readonly supportedExtensions: string[];
  extract(filePath: string): Promise<ExtractedDocument>;
}
