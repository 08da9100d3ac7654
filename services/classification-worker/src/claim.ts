import { randomUUID } from "node:crypto";
import { isStoreError } from "@image-triage/shared";
import type { ClaimOutcome, ProcessingWorkItem } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";

export type ClaimAttempt =
  | { status: "claimed"; item: ProcessingWorkItem; token: string }
  | { status: "lost"; id: string };

export type ClaimOptions = {
  workerId: string;
  batchSize: number;
  clock: () => Date;
};

export const newClaimToken = (workerId: string): string => `${workerId}:${randomUUID()}`;

/**
 * One poll of the claim protocol. Walks the oldest pending items and tries to
 * claim each with a fresh token, yielding as it goes so the caller finishes an
 * item before the next one is claimed. A candidate taken by another worker is
 * reported as `lost` and never retried within the same poll.
 */
export async function* claimPending(store: WorkItemStore, options: ClaimOptions): AsyncGenerator<ClaimAttempt> {
  for await (const candidate of store.listPending(options.batchSize)) {
    const token = newClaimToken(options.workerId);
    let outcome: ClaimOutcome;
    try {
      outcome = await store.tryClaim(candidate.id, token, options.clock());
    } catch (err) {
      if (isStoreError(err, "NOT_FOUND")) {
        yield { status: "lost", id: candidate.id };
        continue;
      }
      throw err;
    }
    if (outcome.status === "claimed") {
      yield { status: "claimed", item: outcome.item, token };
    } else {
      yield { status: "lost", id: candidate.id };
    }
  }
}
