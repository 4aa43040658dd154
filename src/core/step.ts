import { TimeoutError } from "./exec.js";
import { sanitizeError } from "../utils/logger.js";

export type StepResult<T> =
  | { status: "ok"; value: T }
  | { status: "timeout"; message: string }
  | { status: "failed"; message: string };

/**
 * Runs one pipeline step under a time budget. When the budget runs out the signal
 * handed to `fn` is aborted, which kills any external process started with it,
 * and whatever `fn` produces afterwards is discarded.
 *
 * Never rejects: a thrown error becomes `failed`, including one thrown before
 * `fn` returns its promise.
 */
export async function runStep<T>(
  label: string,
  timeoutSeconds: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<StepResult<T>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<StepResult<T>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({
        status: "timeout",
        message: `${label} timed out after ${String(timeoutSeconds)} seconds`,
      });
    }, timeoutSeconds * 1000);
  });

  const work = Promise.resolve()
    .then(() => fn(controller.signal))
    .then(
    (value): StepResult<T> => ({ status: "ok", value }),
    (error: unknown): StepResult<T> =>
      error instanceof TimeoutError
        ? { status: "timeout", message: error.message }
        : { status: "failed", message: sanitizeError(error) }
  );

  try {
    return await Promise.race([work, expired]);
  } finally {
    clearTimeout(timer);
  }
}
