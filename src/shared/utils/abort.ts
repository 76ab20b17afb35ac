import { type AppError, cancelled, isAppError } from "../../core/errors/app-error.js";

/**
 * The error an aborted operation surfaces. The server aborts with a
 * TIMEOUT AppError as the reason when a request overruns; any other
 * reason (client disconnect, caller abort) is a plain cancellation.
 */
export const abortError = (signal: AbortSignal): AppError =>
  isAppError(signal.reason) ? signal.reason : cancelled();

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * fires. The underlying work is not interrupted, only the wait is.
 */
export const untilAborted = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (signal === undefined) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
};
