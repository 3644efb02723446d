import { hasValue } from "./decode.ts";
import { logger } from "./utils/logger.ts";
import { TRACKED_FIELDS } from "./utils/types.ts";
import type {
  BatchDecision,
  LoadOutcome,
  QualityReport,
  RawJobRecord,
} from "./utils/types.ts";

export interface ReportInput {
  records: readonly RawJobRecord[];
  decisions: readonly BatchDecision[];
  outcomes: readonly LoadOutcome[];
  startedAt: Date;
  finishedAt: Date;
  aborted: boolean;
  uniqueCompanies: number;
  uniqueSkills: number;
}

function percent(part: number, whole: number): number {
  if (whole === 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

/** Percentage (one decimal) of records carrying a value, per tracked raw field. */
export function fieldCompleteness(records: readonly RawJobRecord[]): Record<string, number> {
  return Object.fromEntries(
    TRACKED_FIELDS.map((field) => [field, percent(records.filter((r) => hasValue(r, field)).length, records.length)])
  );
}

/** Aggregates per-record decisions and load outcomes. Pure: writes nothing. */
export function buildQualityReport(input: ReportInput): QualityReport {
  const decisions = { accepted: 0, flagged: 0, rejected: 0 };
  const reasonCounts: Record<string, number> = {};

  for (const decision of input.decisions) {
    decisions[decision.outcome]++;
    for (const reason of decision.reasons) {
      reasonCounts[reason] = (reasonCounts[reason] ?? 0) + 1;
    }
  }

  const load = { loaded: 0, replaced: 0, duplicates: 0, failed: 0, notAttempted: 0 };
  const loadFailures: QualityReport["loadFailures"] = [];
  const notAttempted: string[] = [];

  for (const outcome of input.outcomes) {
    switch (outcome.status) {
      case "loaded":
        load.loaded++;
        break;
      case "replaced":
        load.replaced++;
        break;
      case "duplicate":
        load.duplicates++;
        break;
      case "failed":
        load.failed++;
        loadFailures.push({ externalId: outcome.externalId, error: outcome.error ?? "unknown error" });
        break;
      case "not_attempted":
        load.notAttempted++;
        notAttempted.push(outcome.externalId);
        break;
    }
  }

  return {
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
    totalRecords: input.records.length,
    decisions,
    load,
    aborted: input.aborted,
    reasonCounts,
    completeness: fieldCompleteness(input.records),
    duplicateIdCount: load.duplicates,
    rejected: input.decisions
      .filter((d) => d.outcome === "rejected")
      .map((d) => ({ externalId: d.externalId, reasons: d.reasons })),
    flaggedForReview: input.decisions
      .filter((d) => d.outcome === "flagged")
      .map((d) => ({ externalId: d.externalId, reasons: d.reasons })),
    loadFailures,
    notAttempted,
    uniqueCompanies: input.uniqueCompanies,
    uniqueSkills: input.uniqueSkills,
  };
}

export function logReport(report: QualityReport): void {
  logger.info("=== Quality Report ===");
  logger.info(`  Records:        ${report.totalRecords}`);
  logger.info(`  Accepted:       ${report.decisions.accepted}`);
  logger.info(`  Flagged:        ${report.decisions.flagged}`);
  logger.info(`  Rejected:       ${report.decisions.rejected}`);
  logger.info(`  Loaded:         ${report.load.loaded}`);
  logger.info(`  Replaced:       ${report.load.replaced}`);
  logger.info(`  Duplicates:     ${report.load.duplicates}`);
  logger.info(`  Load failures:  ${report.load.failed}`);
  logger.info(`  Not attempted:  ${report.load.notAttempted}`);
  if (report.aborted) {
    logger.warn("  Batch aborted: store connectivity lost");
  }

  const topReasons = Object.entries(report.reasonCounts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10);
  for (const [reason, count] of topReasons) {
    logger.info(`    ${count} × ${reason}`);
  }
}
