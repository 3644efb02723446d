/**
 * Single decoding step from the loosely-typed API record to DecodedRecord.
 *
 * Every downstream stage reads only the decoded shape. A value that is
 * present but cannot be coerced to its field type is left null and listed
 * in `issues`, so the validator decides whether that rejects or flags.
 */
import type {
  DecodeIssue,
  DecodedHighlights,
  DecodedRecord,
  RawJobRecord,
} from "./utils/types.ts";
import { HIGHLIGHT_TYPES } from "./utils/types.ts";

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

class RecordDecoder {
  readonly issues: DecodeIssue[] = [];

  constructor(private readonly raw: RawJobRecord) {}

  private issue(field: string): null {
    this.issues.push({ field, value: this.raw[field] });
    return null;
  }

  /** Trimmed string; numbers are stringified (ids like ONET zones arrive as both). */
  text(field: string): string | null {
    const value = this.raw[field];
    if (isAbsent(value)) return null;
    if (typeof value === "string") return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    return this.issue(field);
  }

  /** Strict string: anything but a non-empty string is an issue. */
  strictText(field: string): string | null {
    const value = this.raw[field];
    if (isAbsent(value)) return null;
    if (typeof value === "string") return value.trim();
    return this.issue(field);
  }

  number(field: string): number | null {
    const value = this.raw[field];
    if (isAbsent(value)) return null;
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : this.issue(field);
    }
    if (typeof value === "string") {
      const cleaned = value.trim().replace(/[$,]/g, "");
      const parsed = Number(cleaned);
      return cleaned !== "" && Number.isFinite(parsed) ? parsed : this.issue(field);
    }
    return this.issue(field);
  }

  boolean(field: string): boolean | null {
    const value = this.raw[field];
    if (isAbsent(value)) return null;
    if (typeof value === "boolean") return value;
    if (value === 1) return true;
    if (value === 0) return false;
    if (typeof value === "string") {
      const lower = value.trim().toLowerCase();
      if (TRUE_VALUES.has(lower)) return true;
      if (FALSE_VALUES.has(lower)) return false;
    }
    return this.issue(field);
  }

  stringArray(field: string): string[] {
    const value = this.raw[field];
    if (isAbsent(value)) return [];
    if (typeof value === "string") return [value.trim()];
    if (!Array.isArray(value)) {
      this.issue(field);
      return [];
    }
    return value
      .filter((v): v is string => typeof v === "string")
      .map((v) => v.trim())
      .filter(Boolean);
  }

  highlights(field: string): DecodedHighlights | null {
    const value = this.raw[field];
    if (value === undefined || value === null) return null;
    if (typeof value !== "object" || Array.isArray(value)) {
      return this.issue(field);
    }

    const result: DecodedHighlights = {};
    for (const type of HIGHLIGHT_TYPES) {
      const lines: unknown = Reflect.get(value, type);
      if (Array.isArray(lines)) {
        result[type] = lines
          .filter((l): l is string => typeof l === "string")
          .map((l) => l.trim())
          .filter(Boolean);
      } else if (typeof lines === "string" && lines.trim()) {
        result[type] = [lines.trim()];
      }
    }
    return result;
  }
}

export function decodeRecord(raw: RawJobRecord): DecodedRecord {
  const d = new RecordDecoder(raw);

  const record: Omit<DecodedRecord, "issues"> = {
    externalId: d.strictText("job_id"),
    title: d.text("job_title"),
    employerName: d.text("employer_name"),
    employerLogo: d.text("employer_logo"),
    employerWebsite: d.text("employer_website"),
    publisher: d.text("job_publisher"),
    employmentType: d.text("job_employment_type"),
    applyLink: d.text("job_apply_link"),
    applyIsDirect: d.boolean("job_apply_is_direct"),
    googleLink: d.text("job_google_link"),
    description: d.text("job_description"),
    isRemote: d.boolean("job_is_remote"),
    postedAtTimestamp: d.number("job_posted_at_timestamp"),
    postedAtDatetime: d.text("job_posted_at_datetime_utc"),
    location: d.text("job_location"),
    city: d.text("job_city"),
    state: d.text("job_state"),
    country: d.text("job_country"),
    latitude: d.number("job_latitude"),
    longitude: d.number("job_longitude"),
    benefits: d.stringArray("job_benefits"),
    minSalary: d.number("job_min_salary"),
    maxSalary: d.number("job_max_salary"),
    salaryPeriod: d.text("job_salary_period"),
    highlights: d.highlights("job_highlights"),
    onetSoc: d.text("job_onet_soc"),
    onetJobZone: d.text("job_onet_job_zone"),
  };

  return { ...record, issues: d.issues };
}

/** True when the raw field carries a usable value (used for completeness stats). */
export function hasValue(raw: RawJobRecord, field: string): boolean {
  const value = raw[field];
  if (isAbsent(value)) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && value !== null) return Object.keys(value).length > 0;
  return true;
}
