import type { WorkItemStatus } from "@image-triage/shared";
import type { WorkItemStore } from "@image-triage/store";

/**
 * Read path for polling clients. Every call reads the store directly, so the
 * answer is the latest committed transition; nothing here waits on workers.
 */
export class StatusQueryService {
  constructor(private readonly store: WorkItemStore) {}

  /** Throws `NOT_FOUND` for unknown ids. */
  async getStatus(id: string): Promise<WorkItemStatus> {
    const item = await this.store.get(id);
    switch (item.state) {
      case "done":
        return { state: item.state, result: item.result };
      case "failed":
        return { state: item.state, failureReason: item.failureReason };
      default:
        return { state: item.state };
    }
  }
}
