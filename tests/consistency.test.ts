import { describe, it, expect } from "vitest";
import { checkConsistency, timestampToDate, timestampToMs } from "../src/consistency.ts";
import { decodeRecord } from "../src/decode.ts";
import { validateRecord } from "../src/validate.ts";
import type { RawJobRecord } from "../src/utils/types.ts";
import { makeRaw } from "./helpers/fixtures.ts";

function check(overrides: Partial<RawJobRecord> = {}) {
  const record = decodeRecord(makeRaw(overrides));
  return checkConsistency(record, validateRecord(record));
}

describe("timestampToMs", () => {
  it("treats small values as seconds", () => {
    expect(timestampToMs(1700000000)).toBe(1700000000000);
  });

  it("passes millisecond values through", () => {
    expect(timestampToMs(1700000000000)).toBe(1700000000000);
  });
});

describe("timestampToDate", () => {
  it("converts seconds to a date", () => {
    expect(timestampToDate(1700000000)?.toISOString()).toBe("2023-11-14T22:13:20.000Z");
  });

  it("returns null past the end of the Date range", () => {
    expect(timestampToDate(1e16)).toBeNull();
  });
});

describe("checkConsistency", () => {
  it("accepts a consistent record", () => {
    expect(check()).toEqual({ status: "accept", flags: [] });
  });

  it("flags a city without a state", () => {
    expect(check({ job_state: null }).flags).toEqual(["location incomplete"]);
  });

  it("flags a salary without a period", () => {
    expect(check({ job_salary_period: null }).flags).toEqual(["salary missing period"]);
  });

  it("does not flag a missing period when there is no salary", () => {
    expect(check({ job_min_salary: null, job_max_salary: null, job_salary_period: null }).flags).toEqual([]);
  });

  it("flags an inverted range", () => {
    const result = check({ job_min_salary: 90000, job_max_salary: 70000 });
    expect(result.status).toBe("flag");
    expect(result.flags).toEqual(["salary range inverted"]);
  });

  it("flags yearly salaries outside the plausible band", () => {
    expect(check({ job_min_salary: 12, job_max_salary: 80000 }).flags).toEqual(["salary outlier"]);
    expect(check({ job_min_salary: 60000, job_max_salary: 900000 }).flags).toEqual(["salary outlier"]);
  });

  it("does not apply the yearly band to hourly pay", () => {
    expect(check({ job_min_salary: 25, job_max_salary: 40, job_salary_period: "HOUR" }).flags).toEqual([]);
  });

  it("flags a timestamp more than a day from the posted datetime", () => {
    expect(check({ job_posted_at_datetime_utc: "2023-11-20T00:00:00.000Z" }).flags).toEqual([
      "posted date mismatch",
    ]);
  });

  it("tolerates a few hours of drift between timestamp and datetime", () => {
    expect(check({ job_posted_at_datetime_utc: "2023-11-14T20:00:00.000Z" }).flags).toEqual([]);
  });

  it("flags an unparseable posted datetime", () => {
    expect(check({ job_posted_at_datetime_utc: "last Tuesday" }).flags).toEqual([
      "invalid job_posted_at_datetime_utc",
    ]);
  });

  it("flags a timestamp outside the representable date range", () => {
    expect(check({ job_posted_at_timestamp: 1e16 }).flags).toEqual(["invalid job_posted_at_timestamp"]);
  });

  it("flags an unparseable datetime even without a timestamp", () => {
    expect(check({ job_posted_at_timestamp: null, job_posted_at_datetime_utc: "soon" }).flags).toEqual([
      "invalid job_posted_at_datetime_utc",
    ]);
  });

  it("flags non-https links", () => {
    const result = check({
      job_apply_link: "http://acme.example.com/apply",
      job_google_link: "ftp://example.com/job",
    });
    expect(result.flags).toEqual(["insecure apply link", "insecure google link"]);
  });

  it("flags very short descriptions without truncating", () => {
    const record = decodeRecord(makeRaw({ job_description: "Analyst role." }));
    const result = checkConsistency(record, validateRecord(record));
    expect(result.flags).toEqual(["description length anomaly"]);
    expect(record.description).toBe("Analyst role.");
  });

  it("flags very long descriptions", () => {
    expect(check({ job_description: "x".repeat(50_001) }).flags).toEqual(["description length anomaly"]);
  });
});
