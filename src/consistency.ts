import type { ConsistencyResult, DecodedRecord, ValidationResult } from "./utils/types.ts";

export const DESCRIPTION_MIN_LENGTH = 100;
export const DESCRIPTION_MAX_LENGTH = 50_000;

const ONE_DAY_MS = 24 * 60 * 60 * 1000;

// Yearly pay outside this band is usually a mislabeled period
const YEARLY_SALARY_FLOOR = 15_000;
const YEARLY_SALARY_CEILING = 500_000;

/** Unix timestamps from the API are seconds; values this large are milliseconds. */
export function timestampToMs(timestamp: number): number {
  return timestamp > 1e12 ? timestamp : timestamp * 1000;
}

/** The posting date for an API timestamp, or null when it falls outside the Date range. */
export function timestampToDate(timestamp: number): Date | null {
  const date = new Date(timestampToMs(timestamp));
  return isNaN(date.getTime()) ? null : date;
}

function isSecureUrl(url: string): boolean {
  return /^https:\/\//i.test(url);
}

/**
 * Cross-field checks on a record that passed validation. Every finding is
 * a flag; flagged records are still loaded and marked for review.
 */
export function checkConsistency(
  record: DecodedRecord,
  validation: ValidationResult
): ConsistencyResult {
  const flags: string[] = [];

  if (record.city !== null && record.state === null) {
    flags.push("location incomplete");
  }

  // Salary
  const { minSalary, maxSalary } = record;
  if ((minSalary !== null || maxSalary !== null) && validation.salaryPeriod === null) {
    flags.push("salary missing period");
  }
  if (minSalary !== null && maxSalary !== null && minSalary > maxSalary) {
    flags.push("salary range inverted");
  }
  if (
    validation.salaryPeriod === "YEARLY" &&
    ((minSalary !== null && minSalary < YEARLY_SALARY_FLOOR) ||
      (maxSalary !== null && maxSalary > YEARLY_SALARY_CEILING))
  ) {
    flags.push("salary outlier");
  }

  // Posted timestamp vs posted datetime
  const fromTimestamp = record.postedAtTimestamp === null ? null : timestampToDate(record.postedAtTimestamp);
  if (record.postedAtTimestamp !== null && fromTimestamp === null) {
    flags.push("invalid job_posted_at_timestamp");
  }
  const fromDatetime = record.postedAtDatetime === null ? null : Date.parse(record.postedAtDatetime);
  if (fromDatetime !== null && isNaN(fromDatetime)) {
    flags.push("invalid job_posted_at_datetime_utc");
  } else if (
    fromDatetime !== null &&
    fromTimestamp !== null &&
    Math.abs(fromTimestamp.getTime() - fromDatetime) > ONE_DAY_MS
  ) {
    flags.push("posted date mismatch");
  }

  // Links
  if (record.applyLink !== null && !isSecureUrl(record.applyLink)) {
    flags.push("insecure apply link");
  }
  if (record.googleLink !== null && !isSecureUrl(record.googleLink)) {
    flags.push("insecure google link");
  }

  // Description length, never truncated
  if (record.description !== null) {
    const length = record.description.length;
    if (length < DESCRIPTION_MIN_LENGTH || length > DESCRIPTION_MAX_LENGTH) {
      flags.push("description length anomaly");
    }
  }

  return { status: flags.length > 0 ? "flag" : "accept", flags };
}
