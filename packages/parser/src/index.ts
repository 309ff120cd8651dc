export type { IExtractor } from "./extractor.interface.js";
export { TextExtractor } from "./text-extractor.js";
export { DoclingExtractor, parseDoclingOutput } from "./docling-extractor.js";
export { CompositeExtractor, createExtractor } from "./factory.js";
export {
  deriveTitle,
  extractTables,
  extractFigures,
  estimatePageCount,
  UNTITLED,
} from "./markdown-structure.js";
