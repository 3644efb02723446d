import type { CompanyRow, ExtractedSkill, HighlightType, JobRow } from "../utils/types.ts";

/**
 * Write operations available inside one store transaction.
 * Upserts are atomic: a conflict on the canonical key returns the existing id.
 */
export interface StoreTransaction {
  upsertCompany(company: CompanyRow): Promise<number>;
  jobExists(jobId: string): Promise<boolean>;
  /** Deletes a job; child rows go with it (ON DELETE CASCADE). */
  deleteJob(jobId: string): Promise<void>;
  insertJob(job: JobRow, companyId: number): Promise<void>;
  upsertSkill(skill: Pick<ExtractedSkill, "name" | "category">): Promise<number>;
  insertJobSkill(jobId: string, skillId: number, isRequired: boolean): Promise<void>;
  insertBenefit(jobId: string, benefit: string): Promise<void>;
  insertHighlight(jobId: string, type: HighlightType, text: string): Promise<void>;
}

export interface JobStore {
  /** Runs `work` in one transaction: committed if it resolves, rolled back if it throws. */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  /** Creates secondary indexes; run after the bulk load. */
  applyIndexes(): Promise<void>;
  close(): Promise<void>;
}
