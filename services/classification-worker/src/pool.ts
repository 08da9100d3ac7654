import { hostname } from "node:os";
import type { AppConfig, Logger } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";
import { createClassifier, type ClassificationAdapter } from "./classifier.js";
import { startSweepSchedule } from "./maintenance-queue.js";
import { WorkerLoop } from "./loop.js";
import { FilePayloadSource, type PayloadSource } from "./payload.js";
import { startSweepInterval, sweepStaleClaims, type SweepHandle } from "./sweeper.js";

export type WorkerPoolDeps = {
  config: AppConfig;
  store: WorkItemStore;
  logger: Logger;
  payloads?: PayloadSource;
  classifier?: ClassificationAdapter;
  clock?: () => Date;
};

export type WorkerPool = {
  loops: WorkerLoop[];
  stop: () => Promise<void>;
};

/**
 * Starts `worker.concurrency` independent loops against one store plus the
 * stale-claim sweep, scheduled through Redis when it is configured.
 */
export const startWorkerPool = async (deps: WorkerPoolDeps): Promise<WorkerPool> => {
  const { config, store, logger } = deps;
  const payloads = deps.payloads ?? new FilePayloadSource(config.payloadRoot);
  const classifier = deps.classifier ?? createClassifier(config.classifier);
  const prefix = `${hostname()}-${process.pid}`;

  const loops = Array.from(
    { length: config.worker.concurrency },
    (_, idx) =>
      new WorkerLoop(
        { store, payloads, classifier, logger, clock: deps.clock },
        {
          workerId: `${prefix}-${idx + 1}`,
          batchSize: config.worker.batchSize,
          pollIntervalMs: config.worker.pollIntervalMs,
          maxIdleIntervalMs: config.worker.maxIdleIntervalMs,
          payloadTimeoutMs: config.worker.payloadTimeoutMs,
          classifyTimeoutMs: config.worker.classifyTimeoutMs,
          maxClaimAttempts: config.worker.maxClaimAttempts,
        },
      ),
  );

  const sweepLogger = logger.child({ component: "sweeper" });
  const sweep = (olderThanMs: number) =>
    sweepStaleClaims(store, { reclaimAfterMs: olderThanMs, logger: sweepLogger, clock: deps.clock });

  const sweeper: SweepHandle = config.redis
    ? await startSweepSchedule(config.redis, config.worker.sweepIntervalMs, config.worker.reclaimAfterMs, sweep, sweepLogger)
    : startSweepInterval(() => sweep(config.worker.reclaimAfterMs), config.worker.sweepIntervalMs, sweepLogger);

  for (const loop of loops) loop.start();
  logger.info({ workers: loops.length, classifier: classifier.name }, "worker pool started");

  return {
    loops,
    stop: async () => {
      await Promise.all(loops.map((loop) => loop.stop()));
      await sweeper.stop();
      logger.info("worker pool stopped");
    },
  };
};

export type { ClassificationAdapter } from "./classifier.js";
export type { PayloadSource } from "./payload.js";
