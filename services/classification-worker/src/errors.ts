import type { FailureReason } from "@image-triage/shared";

export class PayloadUnavailableError extends Error {
  /** Transient failures release the claim instead of failing the item. */
  readonly transient: boolean;

  constructor(message: string, options: { transient: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "PayloadUnavailableError";
    this.transient = options.transient;
  }
}

export class AdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AdapterError";
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Maps a processing error onto the reason recorded on a failed item. */
export const toFailureReason = (err: unknown): FailureReason => {
  if (err instanceof PayloadUnavailableError) return { kind: "PayloadUnavailable", detail: err.message };
  if (err instanceof TimeoutError) return { kind: "Timeout", detail: err.message };
  if (err instanceof AdapterError) return { kind: "AdapterError", detail: err.message };
  return { kind: "AdapterError", detail: err instanceof Error ? err.message : String(err) };
};
