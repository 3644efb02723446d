import type { RawJobRecord } from "../../src/utils/types.ts";

export const DESCRIPTION =
  "We are looking for an analyst to turn hiring data into weekly reports for regional managers. " +
  "You will partner with finance and operations teams on planning.";

/** A record that passes every check with no flags. */
export function makeRaw(overrides: Partial<RawJobRecord> = {}): RawJobRecord {
  return {
    job_id: "job-001",
    job_title: "Data Analyst",
    employer_name: "Acme Analytics",
    employer_website: "https://acme.example.com",
    employer_logo: null,
    job_publisher: "LinkedIn",
    job_employment_type: "FULLTIME",
    job_apply_link: "https://acme.example.com/careers/1",
    job_apply_is_direct: true,
    job_google_link: "https://www.google.com/search?q=job-001",
    job_description: DESCRIPTION,
    job_is_remote: false,
    job_posted_at_timestamp: 1700000000,
    job_posted_at_datetime_utc: "2023-11-14T22:13:20.000Z",
    job_location: "Austin, TX",
    job_city: "Austin",
    job_state: "TX",
    job_country: "US",
    job_latitude: 30.27,
    job_longitude: -97.74,
    job_benefits: ["health_insurance", "retirement_savings", "health_insurance"],
    job_min_salary: 60000,
    job_max_salary: 80000,
    job_salary_period: "YEAR",
    job_highlights: {
      Qualifications: ["3+ years of SQL and Python", "Experience with Postgres"],
      Responsibilities: ["Build Tableau dashboards", "Maintain SQL reports"],
      Benefits: ["Health insurance"],
    },
    job_onet_soc: "15205100",
    job_onet_job_zone: "4",
    ...overrides,
  };
}
