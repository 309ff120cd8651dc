import { createDbClient } from "@quire/db";
import type { IDocumentRepository } from "./document-repository.interface.js";
import { InMemoryDocumentRepository } from "./memory-repository.js";
import { PgDocumentRepository } from "./pg-repository.js";

export interface RepositoryConfig {
  /** Without a URL the repository lives in process memory. */
  url?: string;
  poolMax?: number;
  dimensions?: number;
}

export function createDocumentRepository(config: RepositoryConfig): IDocumentRepository {
  if (!config.url) {
    return new InMemoryDocumentRepository();
  }
  const db = createDbClient({ url: config.url, maxConnections: config.poolMax });
  return new PgDocumentRepository(db, config.dimensions);
}
