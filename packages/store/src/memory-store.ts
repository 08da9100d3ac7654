import { WorkItemStoreError } from "@image-triage/shared";
import type {
  ClaimOutcome,
  ClassificationResult,
  CommitOutcome,
  DoneWorkItem,
  FailedWorkItem,
  FailureReason,
  NewWorkItem,
  PendingWorkItem,
  ProcessingWorkItem,
  WorkItem,
  WorkItemBase,
  WorkItemStats,
} from "@image-triage/shared";
import type { WorkItemStore } from "./store.js";

const stamp = (now: Date) => now.toISOString();

const baseOf = (item: WorkItem): WorkItemBase => ({
  id: item.id,
  ownerRef: item.ownerRef,
  payloadRef: item.payloadRef,
  createdAt: item.createdAt,
  updatedAt: item.updatedAt,
  attempts: item.attempts,
});

const isPending = (item: WorkItem): item is PendingWorkItem => item.state === "pending";

/**
 * Single-process store. Every method checks and writes without awaiting in
 * between, so each transition is atomic with respect to other callers on the
 * same event loop.
 */
export class MemoryWorkItemStore implements WorkItemStore {
  private items = new Map<string, WorkItem>();

  async create(input: NewWorkItem, now: Date): Promise<PendingWorkItem> {
    if (this.items.has(input.id)) {
      throw new WorkItemStoreError("DUPLICATE_ID", input.id);
    }
    const item: PendingWorkItem = {
      id: input.id,
      ownerRef: input.ownerRef,
      payloadRef: input.payloadRef,
      state: "pending",
      createdAt: stamp(now),
      updatedAt: stamp(now),
      attempts: 0,
    };
    this.items.set(item.id, item);
    return structuredClone(item);
  }

  async get(id: string): Promise<WorkItem> {
    return structuredClone(this.require(id));
  }

  async tryClaim(id: string, workerToken: string, now: Date): Promise<ClaimOutcome> {
    const current = this.require(id);
    if (current.state !== "pending") return { status: "already_claimed" };
    const claimed: ProcessingWorkItem = {
      ...baseOf(current),
      state: "processing",
      claimToken: workerToken,
      updatedAt: stamp(now),
      attempts: current.attempts + 1,
    };
    this.items.set(id, claimed);
    return { status: "claimed", item: structuredClone(claimed) };
  }

  async commitResult(
    id: string,
    workerToken: string,
    result: ClassificationResult,
    now: Date,
  ): Promise<CommitOutcome<DoneWorkItem>> {
    const current = this.heldBy(id, workerToken);
    if (!current) return { status: "stale_claim" };
    const done: DoneWorkItem = { ...baseOf(current), state: "done", result: structuredClone(result), updatedAt: stamp(now) };
    this.items.set(id, done);
    return { status: "committed", item: structuredClone(done) };
  }

  async commitFailure(
    id: string,
    workerToken: string,
    reason: FailureReason,
    now: Date,
  ): Promise<CommitOutcome<FailedWorkItem>> {
    const current = this.heldBy(id, workerToken);
    if (!current) return { status: "stale_claim" };
    const failed: FailedWorkItem = { ...baseOf(current), state: "failed", failureReason: { ...reason }, updatedAt: stamp(now) };
    this.items.set(id, failed);
    return { status: "committed", item: structuredClone(failed) };
  }

  async releaseClaim(id: string, workerToken: string, now: Date): Promise<CommitOutcome<PendingWorkItem>> {
    const current = this.heldBy(id, workerToken);
    if (!current) return { status: "stale_claim" };
    const released: PendingWorkItem = { ...baseOf(current), state: "pending", updatedAt: stamp(now) };
    this.items.set(id, released);
    return { status: "committed", item: structuredClone(released) };
  }

  async *listPending(limit: number): AsyncGenerator<PendingWorkItem> {
    const batch = [...this.items.values()]
      .filter(isPending)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .slice(0, Math.max(0, limit));
    for (const item of batch) {
      yield structuredClone(item);
    }
  }

  async reclaimStale(olderThanMs: number, now: Date): Promise<string[]> {
    const cutoff = now.getTime() - olderThanMs;
    const reclaimed: string[] = [];
    for (const item of this.items.values()) {
      if (item.state !== "processing" || Date.parse(item.updatedAt) >= cutoff) continue;
      this.items.set(item.id, { ...baseOf(item), state: "pending", updatedAt: stamp(now) });
      reclaimed.push(item.id);
    }
    return reclaimed;
  }

  async listByOwner(ownerRef: string, limit: number): Promise<WorkItem[]> {
    return [...this.items.values()]
      .filter((item) => item.ownerRef === ownerRef)
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, Math.max(0, limit))
      .map((item) => structuredClone(item));
  }

  async getStats(): Promise<WorkItemStats> {
    const byState = { pending: 0, processing: 0, done: 0, failed: 0 };
    const labels = new Map<string, { count: number; confidence: number }>();
    let confidenceSum = 0;
    let timedCount = 0;
    let timeSum = 0;

    for (const item of this.items.values()) {
      byState[item.state] += 1;
      if (item.state !== "done") continue;
      const { label, confidence, processingTimeMs } = item.result;
      const entry = labels.get(label) ?? { count: 0, confidence: 0 };
      entry.count += 1;
      entry.confidence += confidence;
      labels.set(label, entry);
      confidenceSum += confidence;
      if (processingTimeMs !== undefined) {
        timedCount += 1;
        timeSum += processingTimeMs;
      }
    }

    const byLabel = [...labels.entries()]
      .map(([label, entry]) => ({ label, count: entry.count, avgConfidence: entry.confidence / entry.count }))
      .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));

    return {
      total: this.items.size,
      byState,
      byLabel,
      averageConfidence: byState.done > 0 ? confidenceSum / byState.done : 0,
      averageProcessingTimeMs: timedCount > 0 ? timeSum / timedCount : 0,
    };
  }

  async close(): Promise<void> {}

  private require(id: string): WorkItem {
    const item = this.items.get(id);
    if (!item) throw new WorkItemStoreError("NOT_FOUND", id);
    return item;
  }

  private heldBy(id: string, workerToken: string): ProcessingWorkItem | undefined {
    const item = this.require(id);
    if (item.state !== "processing" || item.claimToken !== workerToken) return undefined;
    return item;
  }
}
