import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { z } from "zod";
import type { ProcessJobData } from "@quire/types";

/** Redis key prefix for every queue; keys read `quire:<queue>:...`. */
export const QUEUE_PREFIX = "quire";

export const QUEUE_NAMES = {
  PROCESS: "process",
} as const;

export const processJobSchema = z.object({
  type: z.literal("process"),
  filePath: z.string().min(1),
  title: z.string(),
  documentId: z.string().min(1).optional(),
});

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: Number(parsed.pathname.slice(1)) || 0,
    // Required by BullMQ workers, which block on Redis.
    maxRetriesPerRequest: null,
  };
}

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const processQueue = new Queue<ProcessJobData>(QUEUE_NAMES.PROCESS, {
    connection: config.connection,
    prefix: QUEUE_PREFIX,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });

  return { processQueue };
}

export type Queues = ReturnType<typeof createQueues>;
