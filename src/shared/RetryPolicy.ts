export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
  /** 測試時可替換為不等待的實作 */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const wait = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt >= opts.maxRetries || !opts.isRetryable(err)) {
        throw err;
      }
      const delay = opts.baseDelayMs * Math.pow(2, attempt) + Math.random() * opts.baseDelayMs;
      opts.onRetry?.(attempt + 1, err, delay);
      await wait(delay);
    }
  }
}
