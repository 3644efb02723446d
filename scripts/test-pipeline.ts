/**
 * Quick smoke test: runs the pipeline over mock records without a database.
 * Run: npx tsx scripts/test-pipeline.ts
 */
import { runPipeline } from "../src/pipeline.ts";
import type { RawJobRecord } from "../src/utils/types.ts";

const mockRecords: RawJobRecord[] = [
  {
    job_id: "mock-1",
    job_title: "Senior Data Analyst",
    employer_name: "Jobs via Dice",
    job_description:
      "Analyze hiring data for a national staffing platform and report trends to leadership. " +
      "Build dashboards and partner with engineering on data quality.",
    job_location: "Washington, DC",
    job_city: "Washington",
    job_state: "DC",
    job_country: "US",
    job_is_remote: "false",
    job_employment_type: "FULLTIME",
    job_apply_link: "https://example.com/apply/1",
    job_min_salary: 50000,
    job_max_salary: 70000,
    job_salary_period: "YEAR",
    job_highlights: {
      Qualifications: ["3+ years of SQL and Python", "Experience with Tableau"],
      Responsibilities: ["Maintain Postgres reporting tables"],
    },
  },
  {
    job_id: "mock-2",
    job_title: "Data Engineer",
    employer_name: "Dice",
    job_description: "Short description.",
    job_location: "Austin, TX",
    job_city: "Austin",
    job_state: "TX",
    job_country: "US",
    job_min_salary: 90,
    job_max_salary: 60,
    job_salary_period: "HOUR",
    job_apply_link: "http://example.com/apply/2",
    job_highlights: { Qualifications: [], Responsibilities: [] },
  },
  {
    job_id: "mock-3",
    employer_name: "Acme Analytics",
    job_description: "Missing a title.",
    job_location: "Boston, MA",
    job_city: "Boston",
    job_state: "MA",
    job_country: "US",
    job_latitude: 95,
  },
];

const { report, prepared, companies } = await runPipeline(mockRecords, { store: null });

console.log("=== Decisions ===");
console.log(`  accepted=${report.decisions.accepted} flagged=${report.decisions.flagged} rejected=${report.decisions.rejected}`);
for (const r of report.rejected) {
  console.log(`  REJECT ${r.externalId}: ${r.reasons.join(", ")}`);
}
for (const f of report.flaggedForReview) {
  console.log(`  FLAG   ${f.externalId}: ${f.reasons.join(", ")}`);
}

console.log("\n=== Prepared jobs ===");
for (const p of prepared) {
  const company = companies.get(p.companyKey);
  const skills = p.skills.map((s) => `${s.name}${s.isRequired ? "*" : ""}`).join(", ");
  console.log(`  ${p.job.jobId} → ${company?.name ?? "?"} | ${p.job.locationStandardized ?? "-"} | ${p.job.salaryPeriod ?? "-"}`);
  console.log(`    skills: ${skills || "(none)"}`);
}

console.log("\n✓ Pipeline simulation complete");
