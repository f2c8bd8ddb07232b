import { RagError } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  label: string;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error, or
 * `maxAttempts` is used up. Delay doubles per attempt, capped at `maxDelayMs`.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      const retryable = error instanceof RagError && error.retryable;
      if (!retryable || attempt >= options.maxAttempts) {
        throw error;
      }

      const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
      console.warn(
        `[Retry] ${options.label} failed (attempt ${attempt}/${options.maxAttempts}), retrying in ${delay}ms:`,
        error instanceof Error ? error.message : String(error)
      );
      await sleep(delay);
    }
  }
}

/**
 * Rejects with `onTimeout()` if `promise` has not settled within `timeoutMs`.
 * The timer is always cleared so nothing is left pending.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
