import { QueryExecutionError, QueryStage, errorMessage } from "../errors.js";

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

class DeadlineExceeded extends Error {}

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when the caller's
 * signal aborts, whichever comes first. The returned promise settles as soon as
 * either happens, even if the task ignores its signal.
 */
export async function withDeadline<T>(
  stage: QueryStage,
  task: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions
): Promise<T> {
  const { timeoutMs, signal } = opts;
  if (signal?.aborted) {
    throw new QueryExecutionError(stage, "cancelled", "request was cancelled before the query started");
  }

  const controller = new AbortController();
  let rejectEarly: (err: Error) => void = () => undefined;
  const early = new Promise<never>((_, reject) => {
    rejectEarly = reject;
  });

  const timeout = setTimeout(() => {
    const err = new DeadlineExceeded(`no response within ${timeoutMs} ms`);
    controller.abort(err);
    rejectEarly(err);
  }, timeoutMs);
  const onAbort = () => {
    const err = new Error("request was cancelled");
    controller.abort(err);
    rejectEarly(err);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([task(controller.signal), early]);
  } catch (err) {
    if (err instanceof QueryExecutionError) throw err;
    if (err instanceof DeadlineExceeded) {
      throw new QueryExecutionError(stage, "timeout", err.message, { cause: err });
    }
    if (signal?.aborted) {
      throw new QueryExecutionError(stage, "cancelled", "request was cancelled", { cause: err });
    }
    throw new QueryExecutionError(stage, classifyFailure(err), errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onAbort);
  }
}

const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "ServiceUnavailable",
  "SessionExpired"
]);

function classifyFailure(err: unknown): "unreachable" | "rejected" {
  if (err && typeof err === "object" && "code" in err) {
    if (typeof err.code === "string" && UNREACHABLE_CODES.has(err.code)) return "unreachable";
  }
  return "rejected";
}
