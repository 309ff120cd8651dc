export type { IDocumentRepository } from "./document-repository.interface.js";
export { InMemoryDocumentRepository } from "./memory-repository.js";
export { PgDocumentRepository, escapeLikePattern, toStoredDocument } from "./pg-repository.js";
export { cosineSimilarity } from "./cosine-similarity.js";
export { createDocumentRepository } from "./factory.js";
export type { RepositoryConfig } from "./factory.js";
