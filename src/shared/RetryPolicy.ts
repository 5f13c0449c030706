function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  /** 單次等待上限；未設定時不封頂 */
  maxDelayMs?: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown, delayMs: number) => void;
}

/** 第 attempt 次重試（0 起算）的等待時間：指數退避 + jitter，並套用上限 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * Math.pow(2, attempt) + Math.random() * baseDelayMs;
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

/**
 * 帶指數退避和 jitter 的重試策略
 * 總嘗試次數 = 1（初始） + maxRetries；不可重試的錯誤立即拋出
 */
export async function withRetry<T>(
  operation: (attempt: number) => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < opts.maxRetries && opts.isRetryable(err)) {
        const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
        opts.onRetry?.(attempt + 1, err, delay);
        await sleep(delay);
      } else {
        throw err;
      }
    }
  }

  throw lastError;
}
