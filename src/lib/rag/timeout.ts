import { ErrorCode, RagError } from './errors';

/**
 * Run `task` with an abort signal that fires after `timeoutMs`.
 * Rejects with SERVICE_UNAVAILABLE on expiry; a non-positive or
 * infinite timeout runs the task unbounded.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle before aborting so the timeout wins the race
      reject(
        new RagError(
          ErrorCode.SERVICE_UNAVAILABLE,
          `${label} timed out after ${timeoutMs}ms`
        )
      );
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
