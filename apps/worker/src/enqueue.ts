import { parseArgs } from "node:util";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseEnv } from "@quire/config";
import { createLogger } from "@quire/logger";
import { createQueues, parseRedisConnection, processJobSchema } from "@quire/queue";
import type { ProcessJobData } from "@quire/types";

export const USAGE = "Usage: enqueue <file> [--title <title>] [--id <documentId>]";

/** Parse `enqueue <file> [--title t] [--id d]` into job data. Paths are made absolute. */
export function parseEnqueueArgs(argv: string[], cwd: string = process.cwd()): ProcessJobData {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      title: { type: "string", short: "t" },
      id: { type: "string" },
    },
    allowPositionals: true,
  });
  const [file] = positionals;
  if (!file || positionals.length > 1) throw new Error(USAGE);

  return processJobSchema.parse({
    type: "process",
    filePath: resolve(cwd, file),
    title: values.title ?? "",
    ...(values.id === undefined ? {} : { documentId: values.id }),
  });
}

async function main(): Promise<void> {
  const data = parseEnqueueArgs(process.argv.slice(2));
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "quire-enqueue" });
  const { processQueue } = createQueues({ connection: parseRedisConnection(config.redis.url) });

  try {
    const job = await processQueue.add("process", data);
    logger.info({ jobId: job.id, filePath: data.filePath }, "Job enqueued");
  } finally {
    await processQueue.close();
  }
}

if (process.argv[1] && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    console.error("[enqueue]", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
