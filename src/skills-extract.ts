import { DEFAULT_TAXONOMY } from "./utils/static-tables.ts";
import type {
  DecodedHighlights,
  ExtractedSkill,
  SkillCategory,
  SkillTaxonomy,
} from "./utils/types.ts";

export const MAX_SKILLS_PER_JOB = 20;

interface SkillPattern {
  name: string;
  category: SkillCategory;
  regex: RegExp;
}

// Alphanumeric boundaries instead of \b so "C++" and "C#" match
// and "Java" does not match inside "JavaScript"
function aliasPattern(alias: string): RegExp {
  const escaped = alias
    .replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
    .replace(/[\s-]+/g, "[\\s-]+");
  return new RegExp(`(?<![a-z0-9])${escaped}(?![a-z0-9])`, "i");
}

const patternCache = new WeakMap<SkillTaxonomy, SkillPattern[]>();

function patternsFor(taxonomy: SkillTaxonomy): SkillPattern[] {
  let patterns = patternCache.get(taxonomy);
  if (!patterns) {
    patterns = [];
    for (const entry of taxonomy.skills) {
      for (const alias of entry.aliases) {
        patterns.push({ name: entry.name, category: entry.category, regex: aliasPattern(alias) });
      }
    }
    patternCache.set(taxonomy, patterns);
  }
  return patterns;
}

/** Canonical skill names mentioned in one line of text, in taxonomy order. */
export function matchSkills(
  line: string,
  taxonomy: SkillTaxonomy = DEFAULT_TAXONOMY
): Array<{ name: string; category: SkillCategory }> {
  const found = new Map<string, SkillCategory>();
  for (const pattern of patternsFor(taxonomy)) {
    if (!found.has(pattern.name) && pattern.regex.test(line)) {
      found.set(pattern.name, pattern.category);
    }
  }
  return [...found].map(([name, category]) => ({ name, category }));
}

export interface SkillExtraction {
  skills: ExtractedSkill[];
  flags: string[];
}

/**
 * Extract skills from a job's highlight blocks.
 *
 * Qualifications mentions are required; Responsibilities mentions are not,
 * unless the same skill is already required. The description is scanned
 * only when the record has no highlights object at all.
 */
export function extractSkills(
  highlights: DecodedHighlights | null,
  description: string | null,
  taxonomy: SkillTaxonomy = DEFAULT_TAXONOMY
): SkillExtraction {
  const skills = new Map<string, ExtractedSkill>();

  const collect = (lines: string[], isRequired: boolean): void => {
    for (const line of lines) {
      for (const { name, category } of matchSkills(line, taxonomy)) {
        const existing = skills.get(name);
        if (existing) {
          existing.isRequired = existing.isRequired || isRequired;
        } else {
          skills.set(name, { name, category, isRequired });
        }
      }
    }
  };

  if (highlights) {
    collect(highlights.Qualifications ?? [], true);
    collect(highlights.Responsibilities ?? [], false);
  } else if (description) {
    collect(description.split(/\r?\n/), false);
  }

  const result = [...skills.values()];
  const flags: string[] = [];
  if (result.length === 0) {
    flags.push("no skills extracted");
  } else if (result.length > MAX_SKILLS_PER_JOB) {
    flags.push("excessive skill count");
  }

  return { skills: result, flags };
}
