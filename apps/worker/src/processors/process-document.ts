import { UnrecoverableError } from "bullmq";
import type { NotebookService } from "@quire/core";
import type { Logger } from "@quire/logger";
import { processJobSchema } from "@quire/queue";
import type { JobResult } from "@quire/types";

export interface ProcessDocumentDeps {
  service: Pick<NotebookService, "process">;
  logger: Logger;
}

/**
 * Run one document through the service. A failure the pipeline marks
 * recoverable is thrown as a plain error so BullMQ retries it; anything else
 * is unrecoverable and goes straight to the dead-letter queue.
 */
export async function processDocumentJob(
  data: unknown,
  deps: ProcessDocumentDeps,
): Promise<JobResult> {
  const parsed = processJobSchema.safeParse(data);
  if (!parsed.success) {
    throw new UnrecoverableError(`Invalid process job: ${parsed.error.message}`);
  }
  const { filePath, title, documentId } = parsed.data;
  const log = deps.logger.child({ filePath });
  const start = Date.now();

  const result = await deps.service.process(
    filePath,
    title,
    documentId === undefined ? {} : { documentId },
  );

  if (result.status === "failed") {
    const message = `${result.stage} failed: ${result.cause.message}`;
    log.warn({ stage: result.stage, recoverable: result.recoverable }, "Document job failed");
    if (!result.recoverable) throw new UnrecoverableError(message);
    throw new Error(message);
  }

  const { artifact } = result;
  const duration = Date.now() - start;
  log.info({ documentId: result.documentId, durationMs: duration }, "Document job completed");

  return {
    success: true,
    processedAt: new Date(),
    duration,
    documentId: result.documentId,
    qualityScore: artifact.enrichment.qualityScore,
    metrics: {
      contentLength: artifact.document.content.length,
      keyPoints: artifact.enrichment.keyPoints.length,
      qaPairs: artifact.enrichment.questions.length,
      topics: artifact.enrichment.topics.length,
      degradations: artifact.degradations.length,
    },
  };
}
