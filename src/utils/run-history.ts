import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { QualityReport } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_HISTORY_PATH = join(__dirname, "../../data/run-history.json");
const MAX_AGE_MONTHS = 18;

function historyPath(): string {
  return process.env.ETL_RUN_HISTORY_PATH || DEFAULT_HISTORY_PATH;
}

// ── Run record schema ────────────────────────────────────────────────

export interface RunRecord {
  timestamp: string;
  durationMs: number;
  totalRecords: number;
  decisions: QualityReport["decisions"];
  load: QualityReport["load"];
  aborted: boolean;
  uniqueCompanies: number;
  uniqueSkills: number;
  topReasons: Array<{ reason: string; count: number }>;
}

export function toRunRecord(report: QualityReport): RunRecord {
  const topReasons = Object.entries(report.reasonCounts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([reason, count]) => ({ reason, count }));

  return {
    timestamp: report.finishedAt,
    durationMs: report.durationMs,
    totalRecords: report.totalRecords,
    decisions: report.decisions,
    load: report.load,
    aborted: report.aborted,
    uniqueCompanies: report.uniqueCompanies,
    uniqueSkills: report.uniqueSkills,
    topReasons,
  };
}

// ── Core operations ──────────────────────────────────────────────────

export function getRunHistory(): RunRecord[] {
  const path = historyPath();
  if (!existsSync(path)) return [];
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    return [];
  }
}

export function appendRunHistory(record: RunRecord): void {
  const history = getRunHistory();
  history.push(record);

  const cutoff = new Date();
  cutoff.setMonth(cutoff.getMonth() - MAX_AGE_MONTHS);
  const pruned = history.filter((r) => new Date(r.timestamp) >= cutoff);

  const path = historyPath();
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(pruned, null, 2) + "\n");
}

// ── Trends across runs ───────────────────────────────────────────────

export interface QualityTrends {
  totalRuns: number;
  loaded30d: number;
  rejected30d: number;
  /** Rejected share of records over the last 30 days, in percent. */
  rejectionRate30d: number;
  abortedRuns: number;
  weeklyLoaded: Array<{ week: string; count: number }>;
  topReasons: Array<{ reason: string; count: number }>;
}

export function getQualityTrends(): QualityTrends {
  const history = getRunHistory();
  const d30 = Date.now() - 30 * 24 * 60 * 60 * 1000;

  let loaded30d = 0;
  let rejected30d = 0;
  let records30d = 0;
  let abortedRuns = 0;
  const reasonCounts = new Map<string, number>();
  const weeklyMap = new Map<string, number>();

  for (const run of history) {
    const ts = new Date(run.timestamp).getTime();
    const loaded = run.load.loaded + run.load.replaced;

    if (ts >= d30) {
      loaded30d += loaded;
      rejected30d += run.decisions.rejected;
      records30d += run.totalRecords;
    }
    if (run.aborted) abortedRuns++;

    for (const { reason, count } of run.topReasons) {
      reasonCounts.set(reason, (reasonCounts.get(reason) ?? 0) + count);
    }

    // Week key: date of the preceding Sunday
    const date = new Date(run.timestamp);
    const weekStart = new Date(date);
    weekStart.setDate(date.getDate() - date.getDay());
    const weekKey = weekStart.toISOString().slice(0, 10);
    weeklyMap.set(weekKey, (weeklyMap.get(weekKey) ?? 0) + loaded);
  }

  const topReasons = [...reasonCounts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([reason, count]) => ({ reason, count }));

  const weeklyLoaded = [...weeklyMap.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([week, count]) => ({ week, count }));

  return {
    totalRuns: history.length,
    loaded30d,
    rejected30d,
    rejectionRate30d: records30d === 0 ? 0 : Math.round((rejected30d / records30d) * 1000) / 10,
    abortedRuns,
    weeklyLoaded,
    topReasons,
  };
}
