import { DEFAULT_VOCABULARY } from "./utils/static-tables.ts";
import type { CompanyRow, Vocabulary } from "./utils/types.ts";

// ── Comparison key ───────────────────────────────────────────────────

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function basicKey(name: string): string {
  return name
    .toLowerCase()
    .replace(/[,.]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

interface NoisePatterns {
  prefix: RegExp | null;
  suffix: RegExp | null;
}

const patternCache = new WeakMap<Vocabulary, NoisePatterns>();

function noisePatterns(vocabulary: Vocabulary): NoisePatterns {
  let patterns = patternCache.get(vocabulary);
  if (!patterns) {
    const prefixes = vocabulary.companyNoisePrefixes.map((p) => escapeRegex(basicKey(p)));
    const suffixes = vocabulary.companyLegalSuffixes.map((s) => escapeRegex(basicKey(s)));
    patterns = {
      prefix: prefixes.length ? new RegExp(`^(?:${prefixes.join("|")})\\s+`) : null,
      suffix: suffixes.length ? new RegExp(`\\s+(?:${suffixes.join("|")})$`) : null,
    };
    patternCache.set(vocabulary, patterns);
  }
  return patterns;
}

export interface CompanyKey {
  key: string;
  /** True when a noise phrase or legal suffix was stripped to produce the key. */
  hadNoise: boolean;
}

/**
 * Comparison key for an employer name: case-folded, punctuation and extra
 * whitespace removed, one leading noise phrase ("Jobs via ...") and any
 * trailing legal suffixes ("Inc", "LLC") stripped.
 */
export function companyKey(name: string, vocabulary: Vocabulary = DEFAULT_VOCABULARY): CompanyKey {
  const base = basicKey(name);
  const { prefix, suffix } = noisePatterns(vocabulary);

  let key = prefix ? base.replace(prefix, "") : base;
  if (suffix) {
    let previous: string;
    do {
      previous = key;
      key = key.replace(suffix, "");
    } while (key !== previous);
  }

  // A name made only of noise ("Jobs via") keeps its basic key
  if (!key) return { key: base, hadNoise: false };
  return { key, hadNoise: key !== base };
}

// ── Batch-scoped index ───────────────────────────────────────────────

export interface ResolvedCompany {
  key: string;
  created: boolean;
}

interface IndexEntry {
  row: CompanyRow;
  displayHadNoise: boolean;
  variants: Set<string>;
}

/**
 * Resolves employer-name variants to one canonical company per batch.
 *
 * The first spelling seen becomes the display name. A later spelling that
 * needed no stripping replaces a noisy display name, so the outcome does
 * not depend on record order. resolve() is synchronous: lookup and insert
 * happen with no suspension point between them, which keeps the index
 * single-writer even when loads run concurrently.
 */
export class CompanyIndex {
  private readonly entries = new Map<string, IndexEntry>();

  constructor(private readonly vocabulary: Vocabulary = DEFAULT_VOCABULARY) {}

  resolve(
    employerName: string,
    extras: { website?: string | null; logoUrl?: string | null } = {}
  ): ResolvedCompany {
    const display = employerName.trim().replace(/\s+/g, " ");
    const { key, hadNoise } = companyKey(display, this.vocabulary);
    const existing = this.entries.get(key);

    if (existing) {
      existing.variants.add(display);
      if (existing.displayHadNoise && !hadNoise) {
        existing.row.name = display;
        existing.displayHadNoise = false;
      }
      existing.row.website ??= extras.website ?? null;
      existing.row.logoUrl ??= extras.logoUrl ?? null;
      return { key, created: false };
    }

    this.entries.set(key, {
      row: {
        name: display,
        nameKey: key,
        website: extras.website ?? null,
        logoUrl: extras.logoUrl ?? null,
      },
      displayHadNoise: hadNoise,
      variants: new Set([display]),
    });
    return { key, created: true };
  }

  get(key: string): CompanyRow | undefined {
    const entry = this.entries.get(key);
    return entry ? { ...entry.row } : undefined;
  }

  variantsOf(key: string): string[] {
    return [...(this.entries.get(key)?.variants ?? [])];
  }

  get size(): number {
    return this.entries.size;
  }
}
