/**
 * Process-wide lookup tables: skill taxonomy, employment-type and
 * salary-period synonyms, company noise phrases, US state names.
 *
 * Loaded once from data/*.json and frozen. An alternate taxonomy or
 * vocabulary file can be supplied through configuration; nothing mutates
 * a table after it is loaded.
 */
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { SkillCategory, SkillTaxonomy, TaxonomyEntry, Vocabulary } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = join(__dirname, "../../data");

const SKILL_CATEGORIES: readonly SkillCategory[] = [
  "language",
  "tool/platform",
  "database",
  "soft-skill",
  "methodology",
  "uncategorized",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string" && v.trim() !== "");
}

function toCategory(value: unknown): SkillCategory {
  return SKILL_CATEGORIES.find((c) => c === value) ?? "uncategorized";
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

// ── Skill taxonomy ───────────────────────────────────────────────────

export function parseTaxonomy(json: unknown): SkillTaxonomy {
  if (!isRecord(json) || !Array.isArray(json.skills)) {
    throw new Error("Skill taxonomy must be an object with a \"skills\" array");
  }

  const seen = new Set<string>();
  const skills: TaxonomyEntry[] = [];

  for (const item of json.skills) {
    if (!isRecord(item) || typeof item.name !== "string" || !item.name.trim()) {
      throw new Error(`Invalid taxonomy entry: ${JSON.stringify(item)}`);
    }
    const name = item.name.trim();
    if (seen.has(name.toLowerCase())) {
      throw new Error(`Duplicate skill in taxonomy: ${name}`);
    }
    seen.add(name.toLowerCase());

    // Short names like "R" and "Go" list explicit phrases instead of matching themselves
    const aliases = stringList(item.aliases).map((a) => a.toLowerCase().trim());
    if (aliases.length === 0) aliases.push(name.toLowerCase());

    skills.push(Object.freeze({
      name,
      category: toCategory(item.category),
      aliases: Object.freeze(aliases),
    }));
  }

  return Object.freeze({ skills: Object.freeze(skills) });
}

export function loadTaxonomy(path: string = join(DATA_DIR, "skill-taxonomy.json")): SkillTaxonomy {
  return parseTaxonomy(readJson(path));
}

// ── Vocabularies ─────────────────────────────────────────────────────

function synonymTable(value: unknown, label: string): Readonly<Record<string, readonly string[]>> {
  if (!isRecord(value)) {
    throw new Error(`Vocabulary "${label}" must be an object of synonym lists`);
  }
  const table: Record<string, readonly string[]> = {};
  for (const [canonical, synonyms] of Object.entries(value)) {
    table[canonical] = Object.freeze(stringList(synonyms));
  }
  return Object.freeze(table);
}

export function parseVocabulary(json: unknown): Vocabulary {
  if (!isRecord(json)) {
    throw new Error("Vocabulary file must contain a JSON object");
  }
  return Object.freeze({
    employmentTypes: synonymTable(json.employmentTypes, "employmentTypes"),
    salaryPeriods: synonymTable(json.salaryPeriods, "salaryPeriods"),
    companyNoisePrefixes: Object.freeze(stringList(json.companyNoisePrefixes)),
    companyLegalSuffixes: Object.freeze(stringList(json.companyLegalSuffixes)),
  });
}

export function loadVocabulary(path: string = join(DATA_DIR, "vocabularies.json")): Vocabulary {
  return parseVocabulary(readJson(path));
}

// ── US states ────────────────────────────────────────────────────────

function loadStates(): ReadonlyMap<string, string> {
  const json = readJson(join(DATA_DIR, "us-states.json"));
  const map = new Map<string, string>();
  if (isRecord(json)) {
    for (const [abbrev, name] of Object.entries(json)) {
      if (typeof name === "string") map.set(abbrev.toUpperCase(), name);
    }
  }
  return map;
}

export const DEFAULT_TAXONOMY: SkillTaxonomy = loadTaxonomy();
export const DEFAULT_VOCABULARY: Vocabulary = loadVocabulary();
export const US_STATES: ReadonlyMap<string, string> = loadStates();
