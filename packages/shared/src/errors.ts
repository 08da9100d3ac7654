export type WorkItemStoreErrorCode = "DUPLICATE_ID" | "NOT_FOUND";

/**
 * Raised by a store when a caller breaks its contract. Claim races are not
 * errors and are reported through `ClaimOutcome` / `CommitOutcome` instead.
 */
export class WorkItemStoreError extends Error {
  readonly code: WorkItemStoreErrorCode;
  readonly itemId: string;

  constructor(code: WorkItemStoreErrorCode, itemId: string) {
    super(code === "DUPLICATE_ID" ? `work item ${itemId} already exists` : `work item ${itemId} not found`);
    this.name = "WorkItemStoreError";
    this.code = code;
    this.itemId = itemId;
  }
}

export const isStoreError = (err: unknown, code?: WorkItemStoreErrorCode): err is WorkItemStoreError =>
  err instanceof WorkItemStoreError && (code === undefined || err.code === code);
