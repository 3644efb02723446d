import { CompanyIndex, companyKey } from "./company-index.ts";
import { checkConsistency } from "./consistency.ts";
import { decodeRecord } from "./decode.ts";
import { describeError } from "./errors.ts";
import { loadBatch } from "./loader.ts";
import { buildQualityReport } from "./report.ts";
import { extractSkills } from "./skills-extract.ts";
import { transformRecord } from "./transform.ts";
import { validateRecord } from "./validate.ts";
import { logger } from "./utils/logger.ts";
import { DEFAULT_TAXONOMY, DEFAULT_VOCABULARY } from "./utils/static-tables.ts";
import type { JobStore } from "./db/store.ts";
import type {
  BatchDecision,
  LoadOutcome,
  PreparedJob,
  QualityReport,
  RawJobRecord,
  SkillTaxonomy,
  Vocabulary,
} from "./utils/types.ts";

export interface PipelineOptions {
  /** Target store; null runs every stage except the load (dry run). */
  store: JobStore | null;
  replace?: boolean;
  concurrency?: number;
  taxonomy?: SkillTaxonomy;
  vocabulary?: Vocabulary;
  /** When the batch was fetched; defaults to the start of the run. */
  fetchedAt?: Date;
  now?: () => Date;
}

export interface PipelineResult {
  report: QualityReport;
  decisions: BatchDecision[];
  prepared: PreparedJob[];
  companies: CompanyIndex;
}

function recordLabel(externalId: string | null, index: number): string {
  return externalId ?? `<record ${index + 1}>`;
}

/**
 * Runs one batch: decode → validate → consistency → normalize/extract →
 * load → report. Always returns a complete report, including when the
 * store aborts part-way.
 */
export async function runPipeline(
  records: readonly RawJobRecord[],
  options: PipelineOptions
): Promise<PipelineResult> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const fetchedAt = (options.fetchedAt ?? startedAt).toISOString();
  const taxonomy = options.taxonomy ?? DEFAULT_TAXONOMY;
  const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;

  const companies = new CompanyIndex(vocabulary);
  const decisions: BatchDecision[] = [];
  const prepared: PreparedJob[] = [];
  const batchDuplicates: LoadOutcome[] = [];
  const seenIds = new Set<string>();

  logger.info(`Processing batch of ${records.length} records`);

  const mergedKeys = new Set<string>();

  records.forEach((raw, index) => {
    let externalId = recordLabel(null, index);
    try {
      const record = decodeRecord(raw);
      externalId = recordLabel(record.externalId, index);

      const validation = validateRecord(record, vocabulary);
      if (validation.status === "reject") {
        logger.debug(`Rejected ${externalId}: ${validation.reasons.join(", ")}`);
        decisions.push({ externalId, index, outcome: "rejected", reasons: validation.reasons });
        return;
      }

      const consistency = checkConsistency(record, validation);
      const extraction = extractSkills(record.highlights, record.description, taxonomy);
      const flags = [...validation.flags, ...consistency.flags, ...extraction.flags];

      const { employerName } = record;
      if (employerName === null) {
        throw new Error("accepted record has no employer name");
      }

      const duplicate = seenIds.has(externalId);
      const job = duplicate
        ? null
        : transformRecord({
            index,
            record,
            validation,
            flags,
            skills: extraction.skills,
            companyKey: companyKey(employerName, vocabulary).key,
            fetchedAt,
          });

      decisions.push({
        externalId,
        index,
        outcome: flags.length > 0 ? "flagged" : "accepted",
        reasons: flags,
      });

      if (!job) {
        logger.debug(`Duplicate job id within batch: ${externalId}`);
        batchDuplicates.push({ externalId, index, status: "duplicate", attempts: 0 });
        return;
      }
      seenIds.add(externalId);

      const company = companies.resolve(employerName, {
        website: record.employerWebsite,
        logoUrl: record.employerLogo,
      });
      if (!company.created) mergedKeys.add(company.key);
      prepared.push(job);
    } catch (err) {
      logger.error(`Could not process ${externalId}`, err);
      decisions.push({
        externalId,
        index,
        outcome: "rejected",
        reasons: [`processing error: ${describeError(err)}`],
      });
    }
  });

  for (const key of mergedKeys) {
    const variants = companies.variantsOf(key);
    if (variants.length > 1) {
      logger.debug(`Merged company variants into "${companies.get(key)?.name ?? key}": ${variants.join(" | ")}`);
    }
  }

  const rejected = decisions.filter((d) => d.outcome === "rejected").length;
  logger.info(
    `Validation: ${records.length - rejected} passed, ${rejected} rejected, ` +
      `${batchDuplicates.length} duplicate ids in batch, ${companies.size} companies`
  );

  let outcomes: LoadOutcome[] = [];
  let aborted = false;

  if (options.store) {
    const result = await loadBatch(options.store, prepared, {
      replace: options.replace,
      concurrency: options.concurrency,
      companies: (key) => companies.get(key),
    });
    outcomes = result.outcomes;
    aborted = result.aborted;
    if (aborted) {
      logger.error(`Batch aborted: ${result.fatalError ?? "store unavailable"}`);
    }
  } else {
    logger.info("Dry run: skipping load");
  }

  outcomes = [...outcomes, ...batchDuplicates].sort((a, b) => a.index - b.index);

  const uniqueSkills = new Set(prepared.flatMap((p) => p.skills.map((s) => s.name))).size;

  const report = buildQualityReport({
    records,
    decisions,
    outcomes,
    startedAt,
    finishedAt: now(),
    aborted,
    uniqueCompanies: companies.size,
    uniqueSkills,
  });

  return { report, decisions, prepared, companies };
}
