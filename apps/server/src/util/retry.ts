/**
 * Sleep and bounded exponential backoff
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type BackoffOptions = {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: Sleep;
};

/** Delay before retry number `attempt` (0-based): base * 2^attempt, capped */
export const backoffDelay = (attempt: number, baseDelayMs: number, maxDelayMs: number): number =>
  Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);

/**
 * Run `fn` until it succeeds, retrying errors accepted by `shouldRetry`.
 * The last error is rethrown once the retry budget is spent.
 */
export const retryWithBackoff = async <T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: BackoffOptions
): Promise<T> => {
  const wait = options.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!shouldRetry(error) || attempt >= options.maxRetries) throw error;
      await wait(backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs));
    }
  }
};
