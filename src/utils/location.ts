/**
 * US state standardization and a display location string.
 *
 *   ("Washington", "DC", "US")        → state "District of Columbia"
 *   ("Austin", "tx", "US")            → state "Texas"
 *   ("Toronto", "ON", "CA")           → state "ON" (only US codes expand)
 */
import { US_STATES } from "./static-tables.ts";

const FULL_STATE_NAMES = new Map([...US_STATES.values()].map((name) => [name.toLowerCase(), name]));

export function standardizeState(state: string | null, country: string | null): string | null {
  if (state === null) return null;
  const trimmed = state.trim();
  if (!trimmed) return null;
  if (country !== null && country !== "US") return trimmed;

  return US_STATES.get(trimmed.toUpperCase()) ?? FULL_STATE_NAMES.get(trimmed.toLowerCase()) ?? trimmed;
}

export function standardizeLocation(city: string | null, state: string | null): string | null {
  if (!city || !state) return null;
  return `${city}, ${state}`;
}
