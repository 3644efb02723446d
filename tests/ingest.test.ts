import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchJobs } from "../src/ingest.ts";

const credentials = { apiKey: "test-key", apiHost: "jsearch.example.com" };
const noRetry = { maxRetries: 0 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchJobs", () => {
  it("requests each page with RapidAPI headers", async () => {
    const fetchMock = vi.fn(async (_url: string | URL, _init?: RequestInit) =>
      jsonResponse({ data: [{ job_id: "a" }] })
    );
    vi.stubGlobal("fetch", fetchMock);

    const records = await fetchJobs("data analyst", credentials, { numPages: 2, retry: noRetry });

    expect(records).toEqual([{ job_id: "a" }, { job_id: "a" }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe("https://jsearch.example.com/search?query=data+analyst&page=1&num_pages=1");
    expect(fetchMock.mock.calls[1][0].toString()).toContain("page=2");
    expect(init?.headers).toEqual({
      "X-RapidAPI-Key": "test-key",
      "X-RapidAPI-Host": "jsearch.example.com",
    });
  });

  it("skips a failed page and keeps going", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ message: "quota" }, 403))
      .mockResolvedValueOnce(jsonResponse({ data: [{ job_id: "b" }] }));
    vi.stubGlobal("fetch", fetchMock);

    const records = await fetchJobs("data analyst", credentials, { numPages: 2, retry: noRetry });

    expect(records).toEqual([{ job_id: "b" }]);
  });

  it("stops at the first empty page", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ data: [] }));
    vi.stubGlobal("fetch", fetchMock);

    const records = await fetchJobs("data analyst", credentials, { numPages: 3, retry: noRetry });

    expect(records).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("drops non-object entries and applies the limit", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ data: [{ job_id: "a" }, "junk", null, { job_id: "b" }, { job_id: "c" }] })
    );
    vi.stubGlobal("fetch", fetchMock);

    const records = await fetchJobs("data analyst", credentials, { numPages: 3, limit: 2, retry: noRetry });

    expect(records).toEqual([{ job_id: "a" }, { job_id: "b" }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
