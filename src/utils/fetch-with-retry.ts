import { logger } from "./logger.ts";

/**
 * Fetch with exponential backoff. Retries on 5xx, 429 and network errors;
 * any other 4xx is returned to the caller as-is.
 */
export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_DELAY_MS = 1000;

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429;
}

function backoff(initialDelayMs: number, attempt: number): Promise<void> {
  const delay = initialDelayMs * Math.pow(2, attempt);
  return new Promise((r) => setTimeout(r, delay));
}

export async function fetchWithRetry(
  url: string | URL,
  init?: RequestInit,
  { maxRetries = DEFAULT_MAX_RETRIES, initialDelayMs = DEFAULT_INITIAL_DELAY_MS }: RetryOptions = {}
): Promise<Response> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const response = await fetch(url, init);
      if (isRetryableStatus(response.status) && attempt < maxRetries) {
        logger.debug(`HTTP ${response.status} from ${String(url)}, retry ${attempt + 1}/${maxRetries}`);
        await backoff(initialDelayMs, attempt);
        continue;
      }
      return response;
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxRetries) throw lastError;
      logger.debug(`Network error (${lastError.message}), retry ${attempt + 1}/${maxRetries}`);
      await backoff(initialDelayMs, attempt);
    }
  }

  throw lastError ?? new Error("Fetch failed after retries");
}
