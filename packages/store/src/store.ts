import type {
  ClaimOutcome,
  ClassificationResult,
  CommitOutcome,
  DoneWorkItem,
  FailedWorkItem,
  FailureReason,
  NewWorkItem,
  PendingWorkItem,
  WorkItem,
  WorkItemStats,
} from "@image-triage/shared";

/**
 * Durable record of submitted images. The store is the only synchronization
 * point between workers, so every state transition below is a single atomic
 * compare-and-set: it either applies completely or leaves the item untouched.
 */
export interface WorkItemStore {
  /** Inserts a `pending` item. Throws `DUPLICATE_ID` when the id is taken. */
  create(input: NewWorkItem, now: Date): Promise<PendingWorkItem>;
  /** Throws `NOT_FOUND` for unknown ids. */
  get(id: string): Promise<WorkItem>;
  tryClaim(id: string, workerToken: string, now: Date): Promise<ClaimOutcome>;
  commitResult(id: string, workerToken: string, result: ClassificationResult, now: Date): Promise<CommitOutcome<DoneWorkItem>>;
  commitFailure(id: string, workerToken: string, reason: FailureReason, now: Date): Promise<CommitOutcome<FailedWorkItem>>;
  /** Hands a claimed item back to `pending` without recording an outcome. */
  releaseClaim(id: string, workerToken: string, now: Date): Promise<CommitOutcome<PendingWorkItem>>;
  /** Oldest first. Each call starts a new scan. */
  listPending(limit: number): AsyncIterable<PendingWorkItem>;
  /**
   * Resets `processing` items last touched more than `olderThanMs` before
   * `now` back to `pending`, clearing their claim. Returns the reclaimed ids.
   */
  reclaimStale(olderThanMs: number, now: Date): Promise<string[]>;
  /** Newest first. */
  listByOwner(ownerRef: string, limit: number): Promise<WorkItem[]>;
  getStats(): Promise<WorkItemStats>;
  close(): Promise<void>;
}
