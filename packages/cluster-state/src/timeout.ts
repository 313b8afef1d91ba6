import { OperationTimeoutError } from './errors.js';

/**
 * Run `fn` with a deadline. The signal handed to `fn` aborts when the
 * deadline passes, and the returned promise rejects with OperationTimeoutError
 * even if `fn` ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn:        (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new OperationTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
