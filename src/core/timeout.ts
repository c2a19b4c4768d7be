/**
 * Bounded async calls. Each call gets its own AbortController so a slow
 * provider can be cancelled without touching unrelated work.
 */
import { ProviderTimeoutError } from './errors.js';

/**
 * Run `operation` with an abort signal that fires after `timeoutMs`.
 * Rejects with ProviderTimeoutError when the bound is hit first.
 * A parent signal, when given, aborts the call as well.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parentSignal?: AbortSignal,
): Promise<T> {
  const abortController = new AbortController();
  const onParentAbort = (): void => {
    abortController.abort(parentSignal?.reason);
  };
  if (parentSignal?.aborted) {
    abortController.abort(parentSignal.reason);
  }
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not
      // with whatever the aborted operation throws.
      reject(new ProviderTimeoutError(label, timeoutMs));
      abortController.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(abortController.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
