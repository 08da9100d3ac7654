import type { Logger } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";

export type SweepOptions = {
  reclaimAfterMs: number;
  logger: Logger;
  clock?: () => Date;
};

export type SweepHandle = { stop: () => Promise<void> };

/**
 * Hands `processing` items whose holder has gone quiet for longer than
 * `reclaimAfterMs` back to `pending`. A slow but live holder loses its claim
 * too; its later commit is then rejected as stale.
 */
export const sweepStaleClaims = async (store: WorkItemStore, options: SweepOptions): Promise<string[]> => {
  const now = (options.clock ?? (() => new Date()))();
  const reclaimed = await store.reclaimStale(options.reclaimAfterMs, now);
  if (reclaimed.length > 0) {
    options.logger.warn({ count: reclaimed.length, itemIds: reclaimed }, "reclaimed stale claims");
  }
  return reclaimed;
};

/** Runs `sweep` every `intervalMs` in this process, never overlapping itself. */
export const startSweepInterval = (sweep: () => Promise<unknown>, intervalMs: number, logger: Logger): SweepHandle => {
  let running: Promise<void> | undefined;

  const tick = () => {
    if (running) return;
    running = sweep()
      .then(() => undefined)
      .catch((err: unknown) => logger.error({ err }, "stale claim sweep failed"))
      .finally(() => {
        running = undefined;
      });
  };

  const timer = setInterval(tick, intervalMs);
  tick();

  return {
    stop: async () => {
      clearInterval(timer);
      await running;
    },
  };
};
