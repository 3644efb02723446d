export type SeniorityLevel = "Executive" | "Senior" | "Mid" | "Junior" | "Unknown";

// First match wins, so executive titles are checked before "manager"
const SENIORITY_PATTERNS: [RegExp, SeniorityLevel][] = [
  [/\b(ceo|cfo|coo|cto|chief|president|vp|vice president|director|principal)\b/i, "Executive"],
  [/\b(senior|sr\.?|lead|staff|manager)\b/i, "Senior"],
  [/\b(junior|jr\.?|entry[- ]level|entry|associate|intern|apprentice)\b/i, "Junior"],
  [/\b(mid[- ]level|mid|analyst|engineer|specialist|coordinator)\b/i, "Mid"],
];

/** Seniority bucket from job-title keywords; titles with no keyword count as Mid. */
export function categorizeSeniority(title: string | null): SeniorityLevel {
  if (!title || !title.trim()) return "Unknown";
  for (const [pattern, level] of SENIORITY_PATTERNS) {
    if (pattern.test(title)) return level;
  }
  return "Mid";
}
