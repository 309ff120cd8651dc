export {
  QUEUE_NAMES,
  QUEUE_PREFIX,
  createQueues,
  parseRedisConnection,
  processJobSchema,
} from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, isFinalFailure } from "./dlq.js";
export type { DeadLetterData, DeadLetterQueue } from "./dlq.js";
