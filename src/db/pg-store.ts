import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { Pool, PoolClient } from "pg";
import { withTransaction } from "./client.ts";
import type { JobStore, StoreTransaction } from "./store.ts";
import type { CompanyRow, ExtractedSkill, HighlightType, JobRow } from "../utils/types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SCHEMA_PATH = join(__dirname, "../../db/schema.sql");
const INDEXES_PATH = join(__dirname, "../../db/indexes.sql");

function firstId(rows: Array<Record<string, unknown>>, column: string): number {
  const value = rows[0]?.[column];
  if (typeof value !== "number") {
    throw new Error(`Expected ${column} from upsert, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * SQL for one transaction. Company and skill upserts use ON CONFLICT
 * DO UPDATE ... RETURNING so concurrent transactions settle on one row.
 */
class PgTransaction implements StoreTransaction {
  constructor(private readonly client: PoolClient) {}

  async upsertCompany(company: CompanyRow): Promise<number> {
    const result = await this.client.query(
      `INSERT INTO companies (name, name_key, website, logo_url)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (name_key) DO UPDATE SET
         website = COALESCE(companies.website, EXCLUDED.website),
         logo_url = COALESCE(companies.logo_url, EXCLUDED.logo_url)
       RETURNING company_id`,
      [company.name, company.nameKey, company.website, company.logoUrl]
    );
    return firstId(result.rows, "company_id");
  }

  async jobExists(jobId: string): Promise<boolean> {
    const result = await this.client.query(
      "SELECT 1 FROM jobs WHERE job_id = $1 FOR UPDATE",
      [jobId]
    );
    return result.rows.length > 0;
  }

  async deleteJob(jobId: string): Promise<void> {
    await this.client.query("DELETE FROM jobs WHERE job_id = $1", [jobId]);
  }

  async insertJob(job: JobRow, companyId: number): Promise<void> {
    await this.client.query(
      `INSERT INTO jobs (
        job_id, company_id, title, description, location, city, state, country,
        location_standardized, latitude, longitude, is_remote, employment_type,
        seniority_level, publisher, apply_link, apply_is_direct, google_link,
        min_salary, max_salary, avg_salary, salary_range, salary_period,
        onet_soc, onet_job_zone, posted_at_timestamp, posted_at, fetched_at,
        needs_review, review_reasons
      ) VALUES (
        $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15,
        $16, $17, $18, $19, $20, $21, $22, $23, $24, $25, $26, $27, $28, $29, $30
      )`,
      [
        job.jobId,
        companyId,
        job.title,
        job.description,
        job.location,
        job.city,
        job.state,
        job.country,
        job.locationStandardized,
        job.latitude,
        job.longitude,
        job.isRemote,
        job.employmentType,
        job.seniorityLevel,
        job.publisher,
        job.applyLink,
        job.applyIsDirect,
        job.googleLink,
        job.minSalary,
        job.maxSalary,
        job.avgSalary,
        job.salaryRange,
        job.salaryPeriod,
        job.onetSoc,
        job.onetJobZone,
        job.postedAtTimestamp,
        job.postedAt,
        job.fetchedAt,
        job.needsReview,
        job.reviewReasons,
      ]
    );
  }

  async upsertSkill(skill: Pick<ExtractedSkill, "name" | "category">): Promise<number> {
    // The no-op update makes RETURNING yield the existing row on conflict
    const result = await this.client.query(
      `INSERT INTO skills (name, category)
       VALUES ($1, $2)
       ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
       RETURNING skill_id`,
      [skill.name, skill.category]
    );
    return firstId(result.rows, "skill_id");
  }

  async insertJobSkill(jobId: string, skillId: number, isRequired: boolean): Promise<void> {
    await this.client.query(
      "INSERT INTO job_skills (job_id, skill_id, is_required) VALUES ($1, $2, $3)",
      [jobId, skillId, isRequired]
    );
  }

  async insertBenefit(jobId: string, benefit: string): Promise<void> {
    await this.client.query(
      "INSERT INTO job_benefits (job_id, benefit) VALUES ($1, $2)",
      [jobId, benefit]
    );
  }

  async insertHighlight(jobId: string, type: HighlightType, text: string): Promise<void> {
    await this.client.query(
      "INSERT INTO job_highlights (job_id, highlight_type, text) VALUES ($1, $2, $3)",
      [jobId, type, text]
    );
  }
}

export class PgJobStore implements JobStore {
  constructor(private readonly pool: Pool) {}

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, (client) => work(new PgTransaction(client)));
  }

  async applySchema(): Promise<void> {
    await this.pool.query(readFileSync(SCHEMA_PATH, "utf-8"));
  }

  async applyIndexes(): Promise<void> {
    await this.pool.query(readFileSync(INDEXES_PATH, "utf-8"));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
