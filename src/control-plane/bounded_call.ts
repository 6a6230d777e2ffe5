import { errorMessage } from "../observability/logger";

/**
 * Bounded wait with fallback.
 *
 * The collaborator call races a deadline timer. On expiry or failure the caller gets the
 * precomputed fallback and the reason; a late result is discarded. The AbortSignal handed to
 * the task is aborted on expiry, and honoring it is up to the collaborator.
 *
 * Nothing is retried.
 */

export type FallbackReason = "timeout" | "error";

export type BoundedOutcome<T> =
  | { status: "resolved"; value: T }
  | { status: "fallback"; value: T; reason: FallbackReason; message: string; cause: unknown };

export class BoundedCallTimeoutError extends Error {
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "BoundedCallTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export async function resolveWithin<T>(
  task: (signal: AbortSignal) => Promise<T> | T,
  args: { timeoutMs: number; fallback: T }
): Promise<BoundedOutcome<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new BoundedCallTimeoutError(args.timeoutMs);
      controller.abort(err);
      reject(err);
    }, args.timeoutMs);
  });

  try {
    // Wrapping in then() turns a synchronous throw from the task into a rejection.
    const pending = Promise.resolve().then(() => task(controller.signal));
    const value = await Promise.race([pending, deadline]);
    return { status: "resolved", value };
  } catch (err) {
    return {
      status: "fallback",
      value: args.fallback,
      reason: err instanceof BoundedCallTimeoutError ? "timeout" : "error",
      message: errorMessage(err),
      cause: err,
    };
  } finally {
    clearTimeout(timer);
  }
}
