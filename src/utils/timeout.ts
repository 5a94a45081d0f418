import { RequestAbortedError, UpstreamTimeoutError } from "../errors.js";

export interface TimeoutOptions {
  operation: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `operation` with its own AbortSignal, aborted when the timeout elapses or when the
 * caller's signal fires. The returned promise settles as soon as either happens, even if the
 * operation ignores its signal.
 */
export async function withTimeout<T>(
  options: TimeoutOptions,
  operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (options.signal?.aborted) {
    throw new RequestAbortedError(options.operation);
  }

  const controller = new AbortController();
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      controller.abort();
      reject(new UpstreamTimeoutError(options.operation, options.timeoutMs));
    }, options.timeoutMs);

    if (options.signal) {
      onParentAbort = () => {
        controller.abort();
        reject(new RequestAbortedError(options.operation));
      };
      options.signal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timeoutHandle);
    if (onParentAbort) {
      options.signal?.removeEventListener("abort", onParentAbort);
    }
  }
}
