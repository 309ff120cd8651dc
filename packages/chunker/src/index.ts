export type { IChunker } from "./chunker.interface.js";
export { WhitespaceChunker, DEFAULT_CHUNKING } from "./whitespace-chunker.js";
