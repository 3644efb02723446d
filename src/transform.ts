import { timestampToDate } from "./consistency.ts";
import { categorizeSeniority } from "./seniority.ts";
import { standardizeLocation, standardizeState } from "./utils/location.ts";
import { HIGHLIGHT_TYPES } from "./utils/types.ts";
import type {
  DecodedRecord,
  ExtractedSkill,
  HighlightRow,
  JobRow,
  PreparedJob,
  ValidationResult,
} from "./utils/types.ts";

export interface TransformInput {
  index: number;
  record: DecodedRecord;
  validation: ValidationResult;
  flags: string[];
  skills: ExtractedSkill[];
  companyKey: string;
  fetchedAt: string;
}

function postedAtUtc(record: DecodedRecord): string | null {
  if (record.postedAtDatetime !== null) {
    const parsed = Date.parse(record.postedAtDatetime);
    if (!isNaN(parsed)) return new Date(parsed).toISOString();
  }
  if (record.postedAtTimestamp !== null) {
    return timestampToDate(record.postedAtTimestamp)?.toISOString() ?? null;
  }
  return null;
}

/** Exact-text dedup after trimming, first occurrence kept. */
export function dedupeBenefits(benefits: string[]): string[] {
  return [...new Set(benefits.map((b) => b.trim()).filter(Boolean))];
}

export function highlightRows(record: DecodedRecord): HighlightRow[] {
  const rows: HighlightRow[] = [];
  if (!record.highlights) return rows;
  for (const type of HIGHLIGHT_TYPES) {
    for (const text of record.highlights[type] ?? []) {
      rows.push({ type, text });
    }
  }
  return rows;
}

/**
 * Builds the normalized rows for one record that passed validation.
 * Throws if a required field is missing, which validateRecord rules out.
 */
export function transformRecord(input: TransformInput): PreparedJob {
  const { record, validation } = input;
  const { externalId, title, description, location } = record;
  const country = validation.country;

  if (externalId === null || title === null || description === null || location === null || country === null) {
    throw new Error(`transformRecord called with an unvalidated record at index ${input.index}`);
  }

  const { minSalary, maxSalary } = record;
  const state = standardizeState(record.state, country);
  const bothBounds = minSalary !== null && maxSalary !== null;

  const job: JobRow = {
    jobId: externalId,
    title,
    description,
    location,
    city: record.city,
    state,
    country,
    locationStandardized: standardizeLocation(record.city, state),
    latitude: record.latitude,
    longitude: record.longitude,
    isRemote: record.isRemote,
    employmentType: validation.employmentType,
    seniorityLevel: categorizeSeniority(title),
    publisher: record.publisher,
    applyLink: record.applyLink,
    applyIsDirect: record.applyIsDirect,
    googleLink: record.googleLink,
    minSalary,
    maxSalary,
    avgSalary: bothBounds ? (minSalary + maxSalary) / 2 : null,
    salaryRange: bothBounds ? maxSalary - minSalary : null,
    salaryPeriod: validation.salaryPeriod,
    onetSoc: record.onetSoc,
    onetJobZone: record.onetJobZone,
    postedAtTimestamp: record.postedAtTimestamp,
    postedAt: postedAtUtc(record),
    fetchedAt: input.fetchedAt,
    needsReview: input.flags.length > 0,
    reviewReasons: [...input.flags],
  };

  return {
    index: input.index,
    companyKey: input.companyKey,
    job,
    skills: input.skills,
    benefits: dedupeBenefits(record.benefits),
    highlights: highlightRows(record),
  };
}
