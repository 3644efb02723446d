import "dotenv/config";
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "fs";
import { join, dirname, resolve } from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "./config.ts";
import { createPool } from "./db/client.ts";
import { PgJobStore } from "./db/pg-store.ts";
import { fetchJobs } from "./ingest.ts";
import { runPipeline } from "./pipeline.ts";
import { logReport } from "./report.ts";
import { logger } from "./utils/logger.ts";
import { appendRunHistory, getQualityTrends, toRunRecord } from "./utils/run-history.ts";
import { loadTaxonomy, loadVocabulary } from "./utils/static-tables.ts";
import type { RawJobRecord } from "./utils/types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const REPORT_DIR = join(__dirname, "../reports");

// ── CLI args ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);

function argValue(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

const config = loadConfig();
const dryRun = args.includes("--dry-run");
const replace = args.includes("--replace") || config.replaceExisting;
const inputPath = argValue("--input");
const query = argValue("--query") ?? config.searchQuery;
const pagesRaw = parseInt(argValue("--pages") ?? "", 10);
const pages = !isNaN(pagesRaw) && pagesRaw > 0 ? pagesRaw : config.searchPages;
const limitRaw = parseInt(argValue("--limit") ?? "", 10);
const limit = !isNaN(limitRaw) && limitRaw > 0 ? limitRaw : undefined;

if (dryRun) logger.info("DRY RUN MODE: no database writes");
if (replace) logger.info("Replace mode: existing jobs with the same id are rewritten");

// ── Input ────────────────────────────────────────────────────────────

function readRecordsFile(path: string): RawJobRecord[] {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const list: unknown = Array.isArray(parsed)
    ? parsed
    : typeof parsed === "object" && parsed !== null
      ? Reflect.get(parsed, "data")
      : undefined;
  if (!Array.isArray(list)) {
    throw new Error(`${path} must contain an array of job records (or {"data": [...]})`);
  }
  return list.filter((r): r is RawJobRecord => typeof r === "object" && r !== null && !Array.isArray(r));
}

async function loadInput(): Promise<RawJobRecord[]> {
  if (inputPath) {
    const records = readRecordsFile(resolve(inputPath));
    logger.info(`Read ${records.length} records from ${inputPath}`);
    return limit ? records.slice(0, limit) : records;
  }
  if (query) {
    if (!config.rapidApiKey) {
      throw new Error("RAPIDAPI_KEY is not set; pass --input <file> or configure the API key");
    }
    return fetchJobs(query, { apiKey: config.rapidApiKey, apiHost: config.rapidApiHost }, { numPages: pages, limit });
  }
  throw new Error("Nothing to ingest: pass --input <file.json> or --query <search terms>");
}

// ── Main ─────────────────────────────────────────────────────────────

function writeReport(report: unknown, finishedAt: string): string {
  if (!existsSync(REPORT_DIR)) {
    mkdirSync(REPORT_DIR, { recursive: true });
  }
  const path = join(REPORT_DIR, `quality-report-${finishedAt.replace(/[:.]/g, "-")}.json`);
  writeFileSync(path, JSON.stringify(report, null, 2) + "\n");
  return path;
}

async function run(): Promise<number> {
  const records = await loadInput();

  const taxonomy = config.taxonomyPath ? loadTaxonomy(config.taxonomyPath) : undefined;
  const vocabulary = config.vocabularyPath ? loadVocabulary(config.vocabularyPath) : undefined;

  let store: PgJobStore | null = null;
  if (!dryRun) {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is not set; use --dry-run to validate without loading");
    }
    store = new PgJobStore(
      createPool({ connectionString: config.databaseUrl, ssl: config.databaseSsl, max: config.loadConcurrency + 1 })
    );
  }

  try {
    const { report } = await runPipeline(records, {
      store,
      replace,
      concurrency: config.loadConcurrency,
      taxonomy,
      vocabulary,
    });

    if (store && !report.aborted) {
      logger.info("Applying secondary indexes");
      await store.applyIndexes();
    }

    logReport(report);
    const reportPath = writeReport(report, report.finishedAt);
    logger.info(`Report written to ${reportPath}`);

    try {
      appendRunHistory(toRunRecord(report));
      const trends = getQualityTrends();
      logger.info(
        `Last 30 days: ${trends.loaded30d} loaded, ${trends.rejected30d} rejected ` +
          `(${trends.rejectionRate30d}%) across ${trends.totalRuns} run(s)`
      );
    } catch (err) {
      logger.warn("Failed to save run history", err);
    }

    return report.aborted ? 2 : 0;
  } finally {
    await store?.close();
  }
}

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.error("Fatal error", err);
    process.exitCode = 1;
  });
