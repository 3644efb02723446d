// ── Raw record from the job-search API ──────────────────────────────
// Every field may be absent, null, or of an unexpected type.

export interface RawJobHighlights {
  Qualifications?: unknown;
  Responsibilities?: unknown;
  Benefits?: unknown;
  [key: string]: unknown;
}

export interface RawJobRecord {
  job_id?: unknown;
  job_title?: unknown;
  employer_name?: unknown;
  employer_logo?: unknown;
  employer_website?: unknown;
  job_publisher?: unknown;
  job_employment_type?: unknown;
  job_apply_link?: unknown;
  job_apply_is_direct?: unknown;
  job_google_link?: unknown;
  job_description?: unknown;
  job_is_remote?: unknown;
  job_posted_at_timestamp?: unknown;
  job_posted_at_datetime_utc?: unknown;
  job_location?: unknown;
  job_city?: unknown;
  job_state?: unknown;
  job_country?: unknown;
  job_latitude?: unknown;
  job_longitude?: unknown;
  job_benefits?: unknown;
  job_min_salary?: unknown;
  job_max_salary?: unknown;
  job_salary_period?: unknown;
  job_highlights?: unknown;
  job_onet_soc?: unknown;
  job_onet_job_zone?: unknown;
  [key: string]: unknown;
}

/** Raw fields tracked by the completeness section of the quality report. */
export const TRACKED_FIELDS = [
  "job_id",
  "job_title",
  "employer_name",
  "employer_website",
  "employer_logo",
  "job_description",
  "job_location",
  "job_city",
  "job_state",
  "job_country",
  "job_latitude",
  "job_longitude",
  "job_is_remote",
  "job_employment_type",
  "job_publisher",
  "job_apply_link",
  "job_google_link",
  "job_min_salary",
  "job_max_salary",
  "job_salary_period",
  "job_onet_soc",
  "job_posted_at_timestamp",
  "job_posted_at_datetime_utc",
  "job_benefits",
  "job_highlights",
] as const;

export type TrackedField = (typeof TRACKED_FIELDS)[number];

// ── Decoded record (after the single type-normalizing step) ─────────

export const HIGHLIGHT_TYPES = ["Qualifications", "Responsibilities", "Benefits"] as const;
export type HighlightType = (typeof HIGHLIGHT_TYPES)[number];

export type DecodedHighlights = Partial<Record<HighlightType, string[]>>;

export interface DecodeIssue {
  field: string;
  value: unknown;
}

export interface DecodedRecord {
  externalId: string | null;
  title: string | null;
  employerName: string | null;
  employerLogo: string | null;
  employerWebsite: string | null;
  publisher: string | null;
  employmentType: string | null;
  applyLink: string | null;
  applyIsDirect: boolean | null;
  googleLink: string | null;
  description: string | null;
  isRemote: boolean | null;
  postedAtTimestamp: number | null;
  postedAtDatetime: string | null;
  location: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  latitude: number | null;
  longitude: number | null;
  benefits: string[];
  minSalary: number | null;
  maxSalary: number | null;
  salaryPeriod: string | null;
  highlights: DecodedHighlights | null;
  onetSoc: string | null;
  onetJobZone: string | null;
  /** Fields that were present but could not be decoded to their type. */
  issues: DecodeIssue[];
}

// ── Stage decisions ─────────────────────────────────────────────────

export type EmploymentType =
  | "Full-time"
  | "Part-time"
  | "Contract"
  | "Temporary"
  | "Internship"
  | "Other";

export type SalaryPeriod = "YEARLY" | "MONTHLY" | "HOURLY";

export interface ValidationResult {
  status: "accept" | "reject";
  reasons: string[];
  flags: string[];
  employmentType: EmploymentType | null;
  salaryPeriod: SalaryPeriod | null;
  country: string | null;
}

export interface ConsistencyResult {
  status: "accept" | "flag";
  flags: string[];
}

export type DecisionOutcome = "accepted" | "flagged" | "rejected";

export interface BatchDecision {
  externalId: string;
  /** Zero-based position of the record in the input batch. */
  index: number;
  outcome: DecisionOutcome;
  reasons: string[];
}

// ── Taxonomy / vocabulary config ────────────────────────────────────

export type SkillCategory =
  | "language"
  | "tool/platform"
  | "database"
  | "soft-skill"
  | "methodology"
  | "uncategorized";

export interface TaxonomyEntry {
  name: string;
  category: SkillCategory;
  aliases: readonly string[];
}

export interface SkillTaxonomy {
  skills: readonly TaxonomyEntry[];
}

export interface Vocabulary {
  employmentTypes: Readonly<Record<string, readonly string[]>>;
  salaryPeriods: Readonly<Record<string, readonly string[]>>;
  companyNoisePrefixes: readonly string[];
  companyLegalSuffixes: readonly string[];
}

export interface ExtractedSkill {
  name: string;
  category: SkillCategory;
  isRequired: boolean;
}

// ── Normalized rows ─────────────────────────────────────────────────

export interface CompanyRow {
  name: string;
  nameKey: string;
  website: string | null;
  logoUrl: string | null;
}

export interface JobRow {
  jobId: string;
  title: string;
  description: string;
  location: string;
  city: string | null;
  state: string | null;
  country: string;
  locationStandardized: string | null;
  latitude: number | null;
  longitude: number | null;
  isRemote: boolean | null;
  employmentType: EmploymentType | null;
  seniorityLevel: string;
  publisher: string | null;
  applyLink: string | null;
  applyIsDirect: boolean | null;
  googleLink: string | null;
  minSalary: number | null;
  maxSalary: number | null;
  avgSalary: number | null;
  salaryRange: number | null;
  salaryPeriod: SalaryPeriod | null;
  onetSoc: string | null;
  onetJobZone: string | null;
  postedAtTimestamp: number | null;
  postedAt: string | null;
  fetchedAt: string;
  needsReview: boolean;
  reviewReasons: string[];
}

export interface HighlightRow {
  type: HighlightType;
  text: string;
}

/** Everything the loader writes for one accepted record. */
export interface PreparedJob {
  index: number;
  companyKey: string;
  job: JobRow;
  skills: ExtractedSkill[];
  benefits: string[];
  highlights: HighlightRow[];
}

// ── Load outcomes ───────────────────────────────────────────────────

export type LoadStatus = "loaded" | "replaced" | "duplicate" | "failed" | "not_attempted";

export interface LoadOutcome {
  externalId: string;
  index: number;
  status: LoadStatus;
  attempts: number;
  error?: string;
}

// ── Quality report ──────────────────────────────────────────────────

export interface ReasonedId {
  externalId: string;
  reasons: string[];
}

export interface QualityReport {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  totalRecords: number;
  decisions: {
    accepted: number;
    flagged: number;
    rejected: number;
  };
  load: {
    loaded: number;
    replaced: number;
    duplicates: number;
    failed: number;
    notAttempted: number;
  };
  aborted: boolean;
  reasonCounts: Record<string, number>;
  /** Keyed by TrackedField. */
  completeness: Record<string, number>;
  duplicateIdCount: number;
  rejected: ReasonedId[];
  flaggedForReview: ReasonedId[];
  loadFailures: Array<{ externalId: string; error: string }>;
  notAttempted: string[];
  uniqueCompanies: number;
  uniqueSkills: number;
}
