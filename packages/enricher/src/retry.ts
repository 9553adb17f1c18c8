export interface RetryPolicy {
  retries: number;
  baseDelayMs: number;
  jitterMs: number;
  retryOnStatus: readonly number[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  baseDelayMs: 1000,
  jitterMs: 250,
  retryOnStatus: [429, 500, 502, 503, 504],
};

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = "HttpStatusError";
  }
}

export function backoffDelay(
  attempt: number,
  policy: Partial<RetryPolicy> = {},
  random: () => number = Math.random
): number {
  const { baseDelayMs, jitterMs } = { ...DEFAULT_RETRY_POLICY, ...policy };
  const jitter = (random() * 2 - 1) * jitterMs;
  return Math.max(0, baseDelayMs * 2 ** attempt + jitter);
}

/** Transport failures are retried; HTTP failures only for the listed statuses. */
export function isRetryableError(error: unknown, policy: Partial<RetryPolicy> = {}): boolean {
  if (error instanceof HttpStatusError) {
    const { retryOnStatus } = { ...DEFAULT_RETRY_POLICY, ...policy };
    return retryOnStatus.includes(error.status);
  }
  return true;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  const { retries } = { ...DEFAULT_RETRY_POLICY, ...policy };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !isRetryableError(error, policy)) {
        throw error;
      }
      await wait(backoffDelay(attempt, policy));
    }
  }
}
