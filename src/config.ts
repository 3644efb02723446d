/**
 * Runtime configuration, driven by environment variables.
 * The entry point loads `.env` through dotenv before calling loadConfig().
 */

export interface Config {
  databaseUrl: string | null;
  databaseSsl: boolean;

  // Loader behavior
  loadConcurrency: number;
  replaceExisting: boolean;

  // Static tables (null = bundled defaults under data/)
  taxonomyPath: string | null;
  vocabularyPath: string | null;

  // JSearch API
  rapidApiKey: string | null;
  rapidApiHost: string;
  searchQuery: string | null;
  searchPages: number;
}

type Env = Record<string, string | undefined>;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 1 ? defaultValue : parsed;
}

function optional(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    databaseUrl: optional(env.DATABASE_URL),
    databaseSsl: parseBoolean(env.DATABASE_SSL, false),
    loadConcurrency: parsePositiveInt(env.ETL_LOAD_CONCURRENCY, 1),
    replaceExisting: parseBoolean(env.ETL_REPLACE_EXISTING, false),
    taxonomyPath: optional(env.ETL_TAXONOMY_PATH),
    vocabularyPath: optional(env.ETL_VOCABULARY_PATH),
    rapidApiKey: optional(env.RAPIDAPI_KEY),
    rapidApiHost: optional(env.RAPIDAPI_HOST) ?? "jsearch.p.rapidapi.com",
    searchQuery: optional(env.JSEARCH_QUERY),
    searchPages: parsePositiveInt(env.JSEARCH_PAGES, 1),
  };
}
