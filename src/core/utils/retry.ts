/**
 * Reusable retry logic utility
 */

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt */
  initialDelayMs: number;
  /** Multiplier applied to the delay after every failed attempt */
  backoffFactor: number;
}

export interface RetryHooks {
  retryCondition?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export class RetryError extends Error {
  constructor(
    message: string,
    public originalError: Error,
    public attempts: number,
  ) {
    super(message);
    this.name = "RetryError";
  }
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  backoffFactor: 2,
};

/**
 * Delay to wait after the given (1-based) failed attempt
 */
export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  return Math.max(
    0,
    policy.initialDelayMs * Math.pow(policy.backoffFactor, attempt - 1),
  );
}

/**
 * Executes an operation with retry logic
 * @param operation - The operation to retry; receives the 1-based attempt number
 * @param policy - Attempts and backoff to apply
 * @returns Promise that resolves with the operation result
 * @throws RetryError if all attempts are exhausted
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const {
    retryCondition = () => true,
    onRetry,
    sleep = defaultSleep,
  } = hooks;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  let lastError = new Error("Operation was not attempted");

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = toError(error);

      if (!retryCondition(lastError)) {
        throw new RetryError(lastError.message, lastError, attempt);
      }

      if (attempt === maxAttempts) break;

      const delay = retryDelayMs(policy, attempt);
      onRetry?.(lastError, attempt, delay);
      await sleep(delay);
    }
  }

  throw new RetryError(
    `Operation failed after ${maxAttempts} attempts: ${lastError.message}`,
    lastError,
    maxAttempts,
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
