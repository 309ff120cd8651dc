import { Queue, UnrecoverableError } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { ProcessJobData } from "@quire/types";
import { QUEUE_PREFIX } from "./queues.js";

export const DLQ_NAME = "dead-letter";

export type DeadLetterData = ProcessJobData & { originalQueue: string; failureReason: string };

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterData>(DLQ_NAME, {
    connection,
    prefix: QUEUE_PREFIX,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

/**
 * A failed job is dead once it will not be retried: it raised an
 * UnrecoverableError or used up its attempts.
 */
export function isFinalFailure(error: Error, attemptsMade: number, attempts = 1): boolean {
  return error instanceof UnrecoverableError || attemptsMade >= attempts;
}
