import { StoreError, toAppError } from "@quire/errors";
import { createChildLogger, type Logger } from "@quire/logger";
import type { Answer, DocumentStats, ProcessResult, StoredDocument } from "@quire/types";
import type { ChunkStore, PutOptions } from "./chunk-store.js";
import type { PipelineOrchestrator } from "./pipeline-orchestrator.js";
import { toFailureCause } from "./pipeline-orchestrator.js";
import type { RetrievalEngine } from "./retrieval-engine.js";

export interface NotebookServiceDependencies {
  orchestrator: PipelineOrchestrator;
  store: ChunkStore;
  retrieval: RetrievalEngine;
  logger: Logger;
}

/**
 * Entry point for callers: process a file into a stored notebook, ask
 * questions across stored documents, and list or count them.
 */
export class NotebookService {
  private readonly logger: Logger;

  constructor(private readonly deps: NotebookServiceDependencies) {
    this.logger = createChildLogger(deps.logger, { component: "notebook-service" });
  }

  async process(filePath: string, title: string, options: PutOptions = {}): Promise<ProcessResult> {
    const outcome = await this.deps.orchestrator.run(filePath, title);
    if (outcome.status === "failed") return outcome;

    const { artifact } = outcome;
    try {
      const documentId = await this.deps.store.put(artifact, options);
      return { status: "ready", documentId, artifact };
    } catch (err) {
      const error = toAppError(err, (message, cause) => new StoreError(message, { cause }));
      this.logger.error({ err: error, sourcePath: filePath }, "Storing the notebook failed");
      return {
        status: "failed",
        stage: "storing",
        cause: toFailureCause(error),
        recoverable: true,
        partial: {
          title: artifact.document.title,
          sourcePath: artifact.document.sourcePath,
          completedStages: ["extracting", "enriching", "assembling"],
          note: "The notebook was assembled but could not be stored; the artifact is attached.",
          artifact,
        },
      };
    }
  }

  ask(question: string): Promise<Answer | null> {
    return this.deps.retrieval.query(question);
  }

  stats(): Promise<DocumentStats> {
    return this.deps.store.stats();
  }

  documents(names?: string[]): Promise<StoredDocument[]> {
    return this.deps.store.get(names);
  }
}
