import { TimeoutError } from "./errors.js";

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts, whichever comes first. Rejects with `TimeoutError` on timeout and
 * with the parent's reason on cancellation, even if the task ignores the signal.
 */
export const withTimeout = async <T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> => {
  const controller = new AbortController();
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    forwardAbort();
  } else {
    parent?.addEventListener("abort", forwardAbort, { once: true });
  }
  const timer = setTimeout(() => controller.abort(new TimeoutError(operation, timeoutMs)), timeoutMs);

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
};
