export type WorkItemState = "pending" | "processing" | "done" | "failed";

export const TERMINAL_STATES: readonly WorkItemState[] = ["done", "failed"];

export type ScoreDistribution = Record<string, number>;

export type ClassificationResult = {
  label: string;
  confidence: number;
  scoreDistribution: ScoreDistribution;
  modelVersion?: string;
  processingTimeMs?: number;
};

export type FailureKind = "PayloadUnavailable" | "AdapterError" | "Timeout";

export type FailureReason = {
  kind: FailureKind;
  detail: string;
};

export type WorkItemBase = {
  id: string;
  ownerRef: string;
  payloadRef: string;
  createdAt: string;
  updatedAt: string;
  attempts: number;
};

export type PendingWorkItem = WorkItemBase & { state: "pending" };

export type ProcessingWorkItem = WorkItemBase & {
  state: "processing";
  claimToken: string;
};

export type DoneWorkItem = WorkItemBase & {
  state: "done";
  result: ClassificationResult;
};

export type FailedWorkItem = WorkItemBase & {
  state: "failed";
  failureReason: FailureReason;
};

/**
 * One submitted image and its processing record.
 *
 * `result` exists only on `done` items, `failureReason` only on `failed` ones
 * and `claimToken` only while `processing`.
 */
export type WorkItem = PendingWorkItem | ProcessingWorkItem | DoneWorkItem | FailedWorkItem;

export type NewWorkItem = {
  id: string;
  ownerRef: string;
  payloadRef: string;
};

export type ClaimOutcome =
  | { status: "claimed"; item: ProcessingWorkItem }
  | { status: "already_claimed" };

export type CommitOutcome<T extends WorkItem = WorkItem> =
  | { status: "committed"; item: T }
  | { status: "stale_claim" };

export type WorkItemStatus = {
  state: WorkItemState;
  result?: ClassificationResult;
  failureReason?: FailureReason;
};

export type LabelStats = {
  label: string;
  count: number;
  avgConfidence: number;
};

export type WorkItemStats = {
  total: number;
  byState: Record<WorkItemState, number>;
  byLabel: LabelStats[];
  averageConfidence: number;
  averageProcessingTimeMs: number;
};

export const isTerminal = (state: WorkItemState): boolean => TERMINAL_STATES.includes(state);
