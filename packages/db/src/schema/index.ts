export * from "./documents.js";
export * from "./chunks.js";
