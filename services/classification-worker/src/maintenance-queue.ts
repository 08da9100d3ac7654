import { Queue, Worker } from "bullmq";
import type { Logger } from "@image-triage/shared";
import type { SweepHandle } from "./sweeper.js";

type SweepJob = { olderThanMs: number };

const queueName = "work-item-maintenance";
const schedulerId = "reclaim-stale";

/**
 * Schedules the stale-claim sweep through Redis so a pool of worker processes
 * runs it once per interval instead of once per process.
 */
export const startSweepSchedule = async (
  connection: { host: string; port: number },
  intervalMs: number,
  olderThanMs: number,
  sweep: (olderThanMs: number) => Promise<string[]>,
  logger: Logger,
): Promise<SweepHandle> => {
  const queue = new Queue<SweepJob>(queueName, { connection });
  await queue.upsertJobScheduler(schedulerId, { every: intervalMs }, { name: schedulerId, data: { olderThanMs } });

  const worker = new Worker<SweepJob>(
    queueName,
    async (job) => {
      const reclaimed = await sweep(job.data.olderThanMs);
      return { reclaimed: reclaimed.length };
    },
    { connection, concurrency: 1 },
  );

  worker.on("failed", (job, err) => {
    logger.error({ err, jobId: job?.id }, "stale claim sweep failed");
  });

  logger.info({ queue: queueName, intervalMs }, "stale claim sweep scheduled");

  return {
    stop: async () => {
      await worker.close();
      await queue.close();
    },
  };
};
