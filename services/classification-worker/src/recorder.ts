import type { ClassificationResult, FailureReason, Logger } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";

export type RecordOutcome = "committed" | "discarded";

/**
 * Writes a worker's outcome back through the store's conditional commits. A
 * stale claim means the item was reclaimed while this worker held it; the
 * outcome is dropped and the newer holder's work stands.
 */
export class ResultRecorder {
  constructor(
    private readonly store: WorkItemStore,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async recordResult(id: string, token: string, result: ClassificationResult): Promise<RecordOutcome> {
    const outcome = await this.store.commitResult(id, token, result, this.clock());
    if (outcome.status === "stale_claim") return this.discard(id, "result");
    this.logger.info({ itemId: id, label: result.label, confidence: result.confidence }, "work item classified");
    return "committed";
  }

  async recordFailure(id: string, token: string, reason: FailureReason): Promise<RecordOutcome> {
    const outcome = await this.store.commitFailure(id, token, reason, this.clock());
    if (outcome.status === "stale_claim") return this.discard(id, "failure");
    this.logger.warn({ itemId: id, kind: reason.kind, detail: reason.detail }, "work item failed");
    return "committed";
  }

  async release(id: string, token: string): Promise<RecordOutcome> {
    const outcome = await this.store.releaseClaim(id, token, this.clock());
    if (outcome.status === "stale_claim") return this.discard(id, "release");
    this.logger.info({ itemId: id }, "work item released for retry");
    return "committed";
  }

  private discard(id: string, what: string): RecordOutcome {
    this.logger.debug({ itemId: id }, `claim went stale, ${what} discarded`);
    return "discarded";
  }
}
