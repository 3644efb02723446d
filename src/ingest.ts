import { RateLimiter } from "./utils/rate-limiter.ts";
import { fetchWithRetry } from "./utils/fetch-with-retry.ts";
import type { RetryOptions } from "./utils/fetch-with-retry.ts";
import { logger } from "./utils/logger.ts";
import type { RawJobRecord } from "./utils/types.ts";

const JSEARCH_PATH = "/search";

// RapidAPI basic tier allows a handful of requests per second
const rateLimiter = new RateLimiter(5, 1000, "JSearch");

export interface JSearchCredentials {
  apiKey: string;
  apiHost: string;
}

export interface SearchOptions {
  page?: number;
  numPages?: number;
  limit?: number;
  retry?: RetryOptions;
}

function isRawRecord(value: unknown): value is RawJobRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function fetchPage(
  query: string,
  page: number,
  credentials: JSearchCredentials,
  retry: RetryOptions | undefined
): Promise<RawJobRecord[]> {
  await rateLimiter.acquire();

  const url = new URL(`https://${credentials.apiHost}${JSEARCH_PATH}`);
  url.searchParams.set("query", query);
  url.searchParams.set("page", String(page));
  url.searchParams.set("num_pages", "1");

  const response = await fetchWithRetry(url, {
    headers: {
      "X-RapidAPI-Key": credentials.apiKey,
      "X-RapidAPI-Host": credentials.apiHost,
    },
  }, retry);
  if (!response.ok) {
    const text = await response.text();
    throw new Error(`JSearch API error ${response.status}: ${text}`);
  }

  const body: unknown = await response.json();
  const data: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "data") : undefined;
  if (!Array.isArray(data)) {
    throw new Error("JSearch response has no data array");
  }
  return data.filter(isRawRecord);
}

/**
 * Fetches `numPages` pages of search results starting at `page` and
 * returns them as one flat list. A failed page is logged and skipped.
 */
export async function fetchJobs(
  query: string,
  credentials: JSearchCredentials,
  options: SearchOptions = {}
): Promise<RawJobRecord[]> {
  const firstPage = options.page ?? 1;
  const numPages = options.numPages ?? 1;
  const records: RawJobRecord[] = [];

  logger.info(`Searching JSearch: "${query}" (${numPages} page(s) from ${firstPage})`);

  for (let page = firstPage; page < firstPage + numPages; page++) {
    try {
      const results = await fetchPage(query, page, credentials, options.retry);
      records.push(...results);
      logger.info(`  Page ${page}: ${results.length} jobs`);
      if (results.length === 0) break;
    } catch (err) {
      logger.error(`Error fetching "${query}" page ${page}`, err);
    }

    if (options.limit && records.length >= options.limit) break;
  }

  const final = options.limit ? records.slice(0, options.limit) : records;
  logger.info(`Fetched ${final.length} raw records`);
  return final;
}
