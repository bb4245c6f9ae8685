// Retry with exponential backoff + jitter for remote capability calls

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryableStatuses?: number[];
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 4,
  baseDelayMs: 250,
  maxDelayMs: 10000,
  retryableStatuses: [429, 500, 502, 503, 504],
};

const RETRYABLE_ERROR_FRAGMENTS = [
  "network",
  "timeout",
  "econnreset",
  "econnrefused",
  "socket hang up",
  "fetch failed",
];

function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  return RETRYABLE_ERROR_FRAGMENTS.some(fragment => message.includes(fragment));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

/** Seconds from a retry-after header, capped; null when absent or not numeric */
export function retryAfterDelay(header: string | null, maxDelayMs: number): number | null {
  if (!header) return null;
  const seconds = Number.parseInt(header, 10);
  if (Number.isNaN(seconds)) return null;
  return Math.min(seconds * 1000, maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  options?: RetryOptions
): Promise<Response> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    const isLastAttempt = attempt === opts.maxAttempts - 1;

    try {
      const response = await fetch(url, init);

      if (response.ok || !opts.retryableStatuses.includes(response.status) || isLastAttempt) {
        return response;
      }

      const delay = retryAfterDelay(response.headers.get("retry-after"), opts.maxDelayMs)
        ?? backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      console.warn(
        `[retry] Status ${response.status} from ${url}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${Math.round(delay)}ms`
      );
      await sleep(delay);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryableError(error) || isLastAttempt) {
        throw lastError;
      }

      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      console.warn(
        `[retry] ${lastError.message} from ${url}, attempt ${attempt + 1}/${opts.maxAttempts}, waiting ${Math.round(delay)}ms`
      );
      await sleep(delay);
    }
  }

  throw lastError ?? new Error(`Failed after ${opts.maxAttempts} attempts`);
}
