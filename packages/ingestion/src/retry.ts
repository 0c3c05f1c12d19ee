export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  minDelayMs: 4_000,
  maxDelayMs: 10_000,
};

export interface RetryOptions {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (details: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay to wait after the given (1-based) failed attempt. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(Math.max(exponential, policy.minDelayMs), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);
  let attempt = 1;

  while (true) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts) {
        throw error;
      }

      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
      attempt += 1;
    }
  }
}
