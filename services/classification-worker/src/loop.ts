import { setTimeout as sleep } from "node:timers/promises";
import { classificationResultSchema } from "@image-triage/shared";
import type { ClassificationResult, Logger, ProcessingWorkItem } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";
import type { ClassificationAdapter } from "./classifier.js";
import { claimPending } from "./claim.js";
import { AdapterError, PayloadUnavailableError, toFailureReason } from "./errors.js";
import type { PayloadSource } from "./payload.js";
import { ResultRecorder, type RecordOutcome } from "./recorder.js";
import { withTimeout } from "./timeout.js";

export type WorkerLoopOptions = {
  workerId: string;
  batchSize: number;
  pollIntervalMs: number;
  maxIdleIntervalMs: number;
  payloadTimeoutMs: number;
  classifyTimeoutMs: number;
  maxClaimAttempts: number;
};

export type WorkerLoopDeps = {
  store: WorkItemStore;
  payloads: PayloadSource;
  classifier: ClassificationAdapter;
  logger: Logger;
  clock?: () => Date;
};

type ItemOutcome = "done" | "failed" | "released" | "discarded" | "abandoned";

export type CycleReport = Record<ItemOutcome | "claimed" | "lost", number>;

const emptyReport = (): CycleReport => ({
  claimed: 0,
  lost: 0,
  done: 0,
  failed: 0,
  released: 0,
  discarded: 0,
  abandoned: 0,
});

const settle = (kind: ItemOutcome, recorded: RecordOutcome): ItemOutcome => (recorded === "discarded" ? "discarded" : kind);

/** Delay before the next poll after `idleCycles` consecutive empty cycles. */
export const idleDelay = (idleCycles: number, pollIntervalMs: number, maxIdleIntervalMs: number): number =>
  Math.min(maxIdleIntervalMs, pollIntervalMs * 2 ** Math.min(idleCycles, 20));

/**
 * Polling consumer. Owns nothing shared beyond its worker id: every state
 * change goes through the store's atomic operations.
 */
export class WorkerLoop {
  readonly workerId: string;
  private readonly store: WorkItemStore;
  private readonly payloads: PayloadSource;
  private readonly classifier: ClassificationAdapter;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly recorder: ResultRecorder;
  private readonly shutdown = new AbortController();
  private running: Promise<void> | undefined;
  private idleCycles = 0;

  constructor(
    deps: WorkerLoopDeps,
    private readonly options: WorkerLoopOptions,
  ) {
    this.workerId = options.workerId;
    this.store = deps.store;
    this.payloads = deps.payloads;
    this.classifier = deps.classifier;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger.child({ workerId: options.workerId });
    this.recorder = new ResultRecorder(deps.store, this.logger, this.clock);
  }

  get stopping(): boolean {
    return this.shutdown.signal.aborted;
  }

  start(): void {
    this.running ??= this.run();
  }

  /**
   * Aborts in-flight payload reads and classifications and waits for the
   * loop to exit. Items interrupted this way stay `processing` until the
   * stale-claim sweep hands them back.
   */
  async stop(): Promise<void> {
    this.shutdown.abort();
    await this.running;
  }

  /** One poll: claim and finish items from a single pending batch. */
  async runOnce(): Promise<CycleReport> {
    const report = emptyReport();
    const attempts = claimPending(this.store, {
      workerId: this.workerId,
      batchSize: this.options.batchSize,
      clock: this.clock,
    });
    for await (const attempt of attempts) {
      if (attempt.status === "lost") {
        report.lost += 1;
      } else {
        report.claimed += 1;
        report[await this.process(attempt.item, attempt.token)] += 1;
      }
      if (this.stopping) break;
    }
    return report;
  }

  private async run(): Promise<void> {
    this.logger.info({ pollIntervalMs: this.options.pollIntervalMs, classifier: this.classifier.name }, "worker loop started");
    while (!this.stopping) {
      let report: CycleReport;
      try {
        report = await this.runOnce();
      } catch (err) {
        this.logger.error({ err }, "worker cycle failed");
        await this.pause();
        continue;
      }
      // a cycle that only handed items back did no work; retry them on a later poll
      if (report.claimed === report.released) {
        await this.pause();
      } else {
        this.idleCycles = 0;
        this.logger.debug({ report }, "worker cycle finished");
      }
    }
    this.logger.info("worker loop stopped");
  }

  private async pause(): Promise<void> {
    const delay = idleDelay(this.idleCycles, this.options.pollIntervalMs, this.options.maxIdleIntervalMs);
    this.idleCycles += 1;
    try {
      await sleep(delay, undefined, { signal: this.shutdown.signal });
    } catch (err) {
      if (!this.stopping) throw err;
    }
  }

  private async process(item: ProcessingWorkItem, token: string): Promise<ItemOutcome> {
    const log = this.logger.child({ itemId: item.id, attempt: item.attempts });
    log.debug("processing work item");

    let result: ClassificationResult;
    try {
      result = await this.classify(item);
    } catch (err) {
      if (this.stopping) {
        log.info("interrupted by shutdown, leaving item for reclaim");
        return "abandoned";
      }
      if (err instanceof PayloadUnavailableError && err.transient && item.attempts < this.options.maxClaimAttempts) {
        log.warn({ err }, "payload read failed");
        return settle("released", await this.recorder.release(item.id, token));
      }
      return settle("failed", await this.recorder.recordFailure(item.id, token, toFailureReason(err)));
    }

    return settle("done", await this.recorder.recordResult(item.id, token, result));
  }

  private async classify(item: ProcessingWorkItem): Promise<ClassificationResult> {
    const bytes = await withTimeout(
      "payload fetch",
      this.options.payloadTimeoutMs,
      (signal) => this.payloads.load(item.payloadRef, signal),
      this.shutdown.signal,
    );

    const started = Date.now();
    const raw = await withTimeout(
      "classification",
      this.options.classifyTimeoutMs,
      (signal) => this.classifier.classify(bytes, signal),
      this.shutdown.signal,
    );

    const parsed = classificationResultSchema.safeParse({
      modelVersion: this.classifier.modelVersion,
      ...raw,
      processingTimeMs: Date.now() - started,
    });
    if (!parsed.success) {
      throw new AdapterError("classifier returned an invalid result", { cause: parsed.error });
    }
    return parsed.data;
  }
}
