import { logger } from "./utils/logger.ts";
import { runPool } from "./utils/worker-pool.ts";
import {
  DuplicateJobError,
  FatalStoreFailure,
  TransactionFailure,
  describeError,
  isConnectivityError,
} from "./errors.ts";
import type { JobStore, StoreTransaction } from "./db/store.ts";
import type { CompanyRow, LoadOutcome, PreparedJob } from "./utils/types.ts";

export interface LoadOptions {
  /** Replace an existing job with the same external id instead of skipping it. */
  replace?: boolean;
  concurrency?: number;
  /** Canonical company rows by comparison key, from the batch's CompanyIndex. */
  companies: (key: string) => CompanyRow | undefined;
}

export interface LoadResult {
  outcomes: LoadOutcome[];
  aborted: boolean;
  fatalError?: string;
}

const MAX_ATTEMPTS = 2;

/** Writes one job and its child rows, in foreign-key order. */
async function writeJob(
  tx: StoreTransaction,
  prepared: PreparedJob,
  company: CompanyRow,
  replace: boolean
): Promise<"loaded" | "replaced"> {
  const { job } = prepared;

  const companyId = await tx.upsertCompany(company);

  let replaced = false;
  if (await tx.jobExists(job.jobId)) {
    if (!replace) throw new DuplicateJobError(job.jobId);
    await tx.deleteJob(job.jobId);
    replaced = true;
  }
  await tx.insertJob(job, companyId);

  for (const skill of prepared.skills) {
    const skillId = await tx.upsertSkill(skill);
    await tx.insertJobSkill(job.jobId, skillId, skill.isRequired);
  }
  for (const benefit of prepared.benefits) {
    await tx.insertBenefit(job.jobId, benefit);
  }
  for (const highlight of prepared.highlights) {
    await tx.insertHighlight(job.jobId, highlight.type, highlight.text);
  }

  return replaced ? "replaced" : "loaded";
}

/**
 * Loads one record in its own transaction. Store errors are retried once;
 * duplicates and connectivity loss are not.
 */
export async function loadRecord(
  store: JobStore,
  prepared: PreparedJob,
  company: CompanyRow,
  replace: boolean
): Promise<LoadOutcome> {
  const externalId = prepared.job.jobId;
  let lastError: unknown;

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      const status = await store.transaction((tx) => writeJob(tx, prepared, company, replace));
      return { externalId, index: prepared.index, status, attempts: attempt };
    } catch (err) {
      if (err instanceof DuplicateJobError) {
        logger.debug(`Skipping duplicate job ${externalId}`);
        return { externalId, index: prepared.index, status: "duplicate", attempts: attempt };
      }
      if (isConnectivityError(err)) {
        throw new FatalStoreFailure(`Store connectivity lost while loading ${externalId}`, { cause: err });
      }
      lastError = err;
      if (attempt < MAX_ATTEMPTS) {
        logger.warn(`Transaction for ${externalId} failed, retrying`, err);
      }
    }
  }

  throw new TransactionFailure(externalId, MAX_ATTEMPTS, { cause: lastError });
}

/**
 * Loads every prepared record. A TransactionFailure affects only its record.
 * A FatalStoreFailure stops new records from starting; they are reported
 * as not_attempted.
 */
export async function loadBatch(
  store: JobStore,
  records: readonly PreparedJob[],
  options: LoadOptions
): Promise<LoadResult> {
  const replace = options.replace ?? false;
  let fatalError: string | undefined;

  const settled = await runPool(
    records,
    options.concurrency ?? 1,
    async (prepared): Promise<LoadOutcome> => {
      const externalId = prepared.job.jobId;
      const company = options.companies(prepared.companyKey);
      if (!company) {
        return { externalId, index: prepared.index, status: "failed", attempts: 0, error: `No company resolved for key "${prepared.companyKey}"` };
      }
      try {
        return await loadRecord(store, prepared, company, replace);
      } catch (err) {
        if (err instanceof FatalStoreFailure) {
          fatalError ??= describeError(err.cause ?? err);
          logger.error(err.message, err.cause);
        } else {
          logger.error(`Load failed for ${externalId}`, err);
        }
        const attempts = err instanceof TransactionFailure ? err.attempts : 1;
        return { externalId, index: prepared.index, status: "failed", attempts, error: describeError(err) };
      }
    },
    () => fatalError !== undefined
  );

  const outcomes = records.map((prepared, i): LoadOutcome =>
    settled.get(i) ?? {
      externalId: prepared.job.jobId,
      index: prepared.index,
      status: "not_attempted",
      attempts: 0,
    }
  );

  return { outcomes, aborted: fatalError !== undefined, fatalError };
}
