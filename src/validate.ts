import { DEFAULT_VOCABULARY } from "./utils/static-tables.ts";
import type {
  DecodedRecord,
  EmploymentType,
  SalaryPeriod,
  ValidationResult,
  Vocabulary,
} from "./utils/types.ts";

// ── Required fields ──────────────────────────────────────────────────

const REQUIRED_FIELDS: Array<[keyof DecodedRecord, string]> = [
  ["externalId", "job_id"],
  ["title", "job_title"],
  ["employerName", "employer_name"],
  ["description", "job_description"],
  ["location", "job_location"],
  ["city", "job_city"],
  ["state", "job_state"],
  ["country", "job_country"],
];

// Decode issues on these fields make the record untrustworthy
const REJECT_ON_DECODE_ISSUE = new Set([
  ...REQUIRED_FIELDS.map(([, field]) => field),
  "job_is_remote",
  "job_latitude",
  "job_longitude",
]);

const COUNTRY_CODE = /^[A-Z]{2}$/;

// ── Synonym lookup ───────────────────────────────────────────────────

const EMPLOYMENT_TYPES: readonly EmploymentType[] = [
  "Full-time",
  "Part-time",
  "Contract",
  "Temporary",
  "Internship",
];
const SALARY_PERIODS: readonly SalaryPeriod[] = ["YEARLY", "MONTHLY", "HOURLY"];

function synonymKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function buildLookup<T extends string>(
  table: Readonly<Record<string, readonly string[]>>,
  allowed: readonly T[]
): Map<string, T> {
  const lookup = new Map<string, T>();
  for (const [canonical, synonyms] of Object.entries(table)) {
    const target = allowed.find((a) => a === canonical);
    if (!target) continue;
    lookup.set(synonymKey(canonical), target);
    for (const synonym of synonyms) {
      lookup.set(synonymKey(synonym), target);
    }
  }
  return lookup;
}

interface Lookups {
  employment: Map<string, EmploymentType>;
  period: Map<string, SalaryPeriod>;
}

// Vocabularies are frozen, so lookups are built once per table object
const lookupCache = new WeakMap<Vocabulary, Lookups>();

function lookupsFor(vocabulary: Vocabulary): Lookups {
  let lookups = lookupCache.get(vocabulary);
  if (!lookups) {
    lookups = {
      employment: buildLookup(vocabulary.employmentTypes, EMPLOYMENT_TYPES),
      period: buildLookup(vocabulary.salaryPeriods, SALARY_PERIODS),
    };
    lookupCache.set(vocabulary, lookups);
  }
  return lookups;
}

export function normalizeEmploymentType(
  raw: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): EmploymentType | null {
  return lookupsFor(vocabulary).employment.get(synonymKey(raw)) ?? null;
}

export function normalizeSalaryPeriod(
  raw: string,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): SalaryPeriod | null {
  return lookupsFor(vocabulary).period.get(synonymKey(raw)) ?? null;
}

// ── Validator ────────────────────────────────────────────────────────

/**
 * Field-level completeness and validity checks for one decoded record.
 * Every rule runs; a record collects all of its reasons, not just the first.
 */
export function validateRecord(
  record: DecodedRecord,
  vocabulary: Vocabulary = DEFAULT_VOCABULARY
): ValidationResult {
  const reasons: string[] = [];
  const flags: string[] = [];
  const issueFields = new Set(record.issues.map((i) => i.field));

  for (const [key, field] of REQUIRED_FIELDS) {
    if (record[key] === null && !issueFields.has(field)) {
      reasons.push(`missing ${field}`);
    }
  }

  for (const field of issueFields) {
    if (REJECT_ON_DECODE_ISSUE.has(field)) {
      reasons.push(`invalid ${field}`);
    } else {
      flags.push(`invalid ${field}`);
    }
  }

  if (record.latitude !== null && (record.latitude < -90 || record.latitude > 90)) {
    reasons.push("latitude out of range");
  }
  if (record.longitude !== null && (record.longitude < -180 || record.longitude > 180)) {
    reasons.push("longitude out of range");
  }

  let country: string | null = null;
  if (record.country !== null) {
    const upper = record.country.toUpperCase();
    if (COUNTRY_CODE.test(upper)) {
      country = upper;
    } else {
      reasons.push("invalid country code");
    }
  }

  let employmentType: EmploymentType | null = null;
  if (record.employmentType !== null) {
    employmentType = normalizeEmploymentType(record.employmentType, vocabulary);
    if (!employmentType) {
      employmentType = "Other";
      flags.push("unmapped employment type");
    }
  }

  let salaryPeriod: SalaryPeriod | null = null;
  if (record.salaryPeriod !== null) {
    salaryPeriod = normalizeSalaryPeriod(record.salaryPeriod, vocabulary);
    if (!salaryPeriod) {
      flags.push("unmapped salary period");
    }
  }

  return {
    status: reasons.length > 0 ? "reject" : "accept",
    reasons,
    flags,
    employmentType,
    salaryPeriod,
    country,
  };
}
