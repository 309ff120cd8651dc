import { Worker } from "bullmq";
import { parseEnv } from "@quire/config";
import { errorMessage } from "@quire/errors";
import { createLogger } from "@quire/logger";
import {
  QUEUE_NAMES,
  QUEUE_PREFIX,
  createDeadLetterQueue,
  isFinalFailure,
  parseRedisConnection,
} from "@quire/queue";
import type { JobResult, ProcessJobData } from "@quire/types";
import { createContainer } from "./container.js";
import { processDocumentJob } from "./processors/process-document.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "quire-worker" });
  const connection = parseRedisConnection(config.redis.url);

  const container = createContainer(config, logger);
  await container.repository.ensureSchema();

  const health = await container.checkHealth();
  if (health.repository !== "ok") {
    await container.close();
    throw new Error("Document repository is unreachable");
  }
  if (health.embeddings === "failing" || health.completion === "failing") {
    logger.warn({ health }, "AI backends failing at startup, results will use fallbacks");
  } else {
    logger.info({ health }, "Health checks passed");
  }

  const deadLetter = createDeadLetterQueue(connection);
  const worker = new Worker<ProcessJobData, JobResult>(
    QUEUE_NAMES.PROCESS,
    (job) => processDocumentJob(job.data, { service: container.service, logger }),
    { connection, prefix: QUEUE_PREFIX, concurrency: config.worker.concurrency },
  );

  worker.on("failed", (job, err) => {
    if (!job || !isFinalFailure(err, job.attemptsMade, job.opts.attempts)) return;
    deadLetter
      .add(job.name, { ...job.data, originalQueue: QUEUE_NAMES.PROCESS, failureReason: err.message })
      .then(() => logger.warn({ jobId: job.id, reason: err.message }, "Job moved to dead-letter queue"))
      .catch((dlqErr: unknown) =>
        logger.error({ jobId: job.id, err: errorMessage(dlqErr) }, "Dead-lettering failed"),
      );
  });
  worker.on("error", (err) => logger.error({ err }, "Worker error"));

  logger.info(
    { queue: `${QUEUE_PREFIX}:${QUEUE_NAMES.PROCESS}`, concurrency: config.worker.concurrency },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await worker.close();
    await deadLetter.close();
    await container.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
