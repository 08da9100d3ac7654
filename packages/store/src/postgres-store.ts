import type { Pool, QueryResult } from "pg";
import { WorkItemStoreError, classificationResultSchema, failureReasonSchema } from "@image-triage/shared";
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
  WorkItemBase,
  WorkItemStats,
} from "@image-triage/shared";
import type { WorkItemStore } from "./store.js";

type WorkItemRow = {
  id: string;
  owner_ref: string;
  payload_ref: string;
  state: string;
  result: unknown;
  failure_reason: unknown;
  claim_token: string | null;
  attempts: number | string;
  created_at: Date | string;
  updated_at: Date | string;
};

type StateCountRow = { state: string; count: number | string };

type LabelStatsRow = {
  label: string;
  count: number | string;
  confidence_sum: number | string;
  time_sum: number | string | null;
  timed_count: number | string;
};

const COLUMNS = "id, owner_ref, payload_ref, state, result, failure_reason, claim_token, attempts, created_at, updated_at";

const UNIQUE_VIOLATION = "23505";

const isUniqueViolation = (err: unknown): boolean =>
  typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;

const toIso = (value: Date | string) => (value instanceof Date ? value : new Date(value)).toISOString();

export const rowToWorkItem = (row: WorkItemRow): WorkItem => {
  const base: WorkItemBase = {
    id: row.id,
    ownerRef: row.owner_ref,
    payloadRef: row.payload_ref,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
    attempts: Number(row.attempts),
  };
  switch (row.state) {
    case "pending":
      return { ...base, state: "pending" };
    case "processing":
      if (!row.claim_token) throw new Error(`work item ${row.id} is processing without a claim token`);
      return { ...base, state: "processing", claimToken: row.claim_token };
    case "done":
      return { ...base, state: "done", result: classificationResultSchema.parse(row.result) };
    case "failed":
      return { ...base, state: "failed", failureReason: failureReasonSchema.parse(row.failure_reason) };
    default:
      throw new Error(`work item ${row.id} has unknown state ${row.state}`);
  }
};

/**
 * Each transition is one conditional UPDATE. Postgres re-evaluates the WHERE
 * clause after waiting on a concurrent writer's row lock, so of two racing
 * claims exactly one matches.
 */
export class PostgresWorkItemStore implements WorkItemStore {
  constructor(private readonly pool: Pool) {}

  async create(input: NewWorkItem, now: Date): Promise<PendingWorkItem> {
    let res: QueryResult<WorkItemRow>;
    try {
      res = await this.pool.query<WorkItemRow>(
        `insert into work_items (id, owner_ref, payload_ref, state, attempts, created_at, updated_at)
         values ($1, $2, $3, 'pending', 0, $4, $5)
         returning ${COLUMNS}`,
        [input.id, input.ownerRef, input.payloadRef, now, now],
      );
    } catch (err) {
      if (isUniqueViolation(err)) throw new WorkItemStoreError("DUPLICATE_ID", input.id);
      throw err;
    }
    const row = res.rows[0];
    if (!row) throw new Error(`work item ${input.id} insert returned no row`);
    const item = rowToWorkItem(row);
    if (item.state !== "pending") throw new Error(`work item ${input.id} was not created pending`);
    return item;
  }

  async get(id: string): Promise<WorkItem> {
    const res = await this.pool.query<WorkItemRow>(`select ${COLUMNS} from work_items where id = $1`, [id]);
    const row = res.rows[0];
    if (!row) throw new WorkItemStoreError("NOT_FOUND", id);
    return rowToWorkItem(row);
  }

  async tryClaim(id: string, workerToken: string, now: Date): Promise<ClaimOutcome> {
    const res = await this.pool.query<WorkItemRow>(
      `update work_items
       set state = 'processing', claim_token = $2, updated_at = $3, attempts = attempts + 1
       where id = $1 and state = 'pending'
       returning ${COLUMNS}`,
      [id, workerToken, now],
    );
    const row = res.rows[0];
    if (!row) {
      await this.get(id);
      return { status: "already_claimed" };
    }
    const item = rowToWorkItem(row);
    if (item.state !== "processing") throw new Error(`work item ${id} was not claimed`);
    return { status: "claimed", item };
  }

  async commitResult(
    id: string,
    workerToken: string,
    result: ClassificationResult,
    now: Date,
  ): Promise<CommitOutcome<DoneWorkItem>> {
    const row = await this.transitionHeld(
      id,
      `state = 'done', result = $3::jsonb, failure_reason = null, claim_token = null, updated_at = $4`,
      [id, workerToken, JSON.stringify(result), now],
    );
    if (!row) return { status: "stale_claim" };
    const item = rowToWorkItem(row);
    if (item.state !== "done") throw new Error(`work item ${id} did not reach done`);
    return { status: "committed", item };
  }

  async commitFailure(
    id: string,
    workerToken: string,
    reason: FailureReason,
    now: Date,
  ): Promise<CommitOutcome<FailedWorkItem>> {
    const row = await this.transitionHeld(
      id,
      `state = 'failed', failure_reason = $3::jsonb, result = null, claim_token = null, updated_at = $4`,
      [id, workerToken, JSON.stringify(reason), now],
    );
    if (!row) return { status: "stale_claim" };
    const item = rowToWorkItem(row);
    if (item.state !== "failed") throw new Error(`work item ${id} did not reach failed`);
    return { status: "committed", item };
  }

  async releaseClaim(id: string, workerToken: string, now: Date): Promise<CommitOutcome<PendingWorkItem>> {
    const row = await this.transitionHeld(id, `state = 'pending', claim_token = null, updated_at = $3`, [
      id,
      workerToken,
      now,
    ]);
    if (!row) return { status: "stale_claim" };
    const item = rowToWorkItem(row);
    if (item.state !== "pending") throw new Error(`work item ${id} was not released`);
    return { status: "committed", item };
  }

  async *listPending(limit: number): AsyncGenerator<PendingWorkItem> {
    const res = await this.pool.query<WorkItemRow>(
      `select ${COLUMNS} from work_items
       where state = 'pending'
       order by created_at asc, id asc
       limit $1`,
      [Math.max(0, limit)],
    );
    for (const row of res.rows) {
      const item = rowToWorkItem(row);
      if (item.state === "pending") yield item;
    }
  }

  async reclaimStale(olderThanMs: number, now: Date): Promise<string[]> {
    const cutoff = new Date(now.getTime() - olderThanMs);
    const res = await this.pool.query<{ id: string }>(
      `update work_items
       set state = 'pending', claim_token = null, updated_at = $2
       where state = 'processing' and updated_at < $1
       returning id`,
      [cutoff, now],
    );
    return res.rows.map((row) => row.id);
  }

  async listByOwner(ownerRef: string, limit: number): Promise<WorkItem[]> {
    const res = await this.pool.query<WorkItemRow>(
      `select ${COLUMNS} from work_items
       where owner_ref = $1
       order by created_at desc, id desc
       limit $2`,
      [ownerRef, Math.max(0, limit)],
    );
    return res.rows.map(rowToWorkItem);
  }

  async getStats(): Promise<WorkItemStats> {
    const states = await this.pool.query<StateCountRow>(
      `select state, count(*) as count from work_items group by state`,
    );
    const labels = await this.pool.query<LabelStatsRow>(
      `select result->>'label' as label,
              count(*) as count,
              sum((result->>'confidence')::float) as confidence_sum,
              sum((result->>'processingTimeMs')::float) as time_sum,
              count(result->>'processingTimeMs') as timed_count
       from work_items
       where state = 'done'
       group by result->>'label'`,
    );

    const byState = { pending: 0, processing: 0, done: 0, failed: 0 };
    for (const row of states.rows) {
      if (row.state === "pending" || row.state === "processing" || row.state === "done" || row.state === "failed") {
        byState[row.state] = Number(row.count);
      }
    }

    let confidenceSum = 0;
    let timeSum = 0;
    let timedCount = 0;
    const byLabel = labels.rows
      .map((row) => {
        const count = Number(row.count);
        confidenceSum += Number(row.confidence_sum);
        timeSum += Number(row.time_sum ?? 0);
        timedCount += Number(row.timed_count);
        return { label: row.label, count, avgConfidence: Number(row.confidence_sum) / count };
      })
      .sort((a, b) => b.count - a.count || a.label.localeCompare(b.label));

    return {
      total: byState.pending + byState.processing + byState.done + byState.failed,
      byState,
      byLabel,
      averageConfidence: byState.done > 0 ? confidenceSum / byState.done : 0,
      averageProcessingTimeMs: timedCount > 0 ? timeSum / timedCount : 0,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async transitionHeld(id: string, assignments: string, params: unknown[]): Promise<WorkItemRow | undefined> {
    const res = await this.pool.query<WorkItemRow>(
      `update work_items
       set ${assignments}
       where id = $1 and state = 'processing' and claim_token = $2
       returning ${COLUMNS}`,
      params,
    );
    const row = res.rows[0];
    if (!row) await this.get(id);
    return row;
  }
}
