// lib/education/states.ts
import stateCodes from "@/data/state-codes.json";

export type StateEntry = { name: string; code: string };

/** Canonical 2-letter postal code, e.g. "NY". */
export type StateCode = string;

/** 50 states + District of Columbia. */
export const STATES: ReadonlyArray<StateEntry> = stateCodes;

const BY_NAME = new Map<string, StateCode>(STATES.map((s) => [s.name, s.code]));
const BY_UPPER_NAME = new Map<string, StateCode>(
  STATES.map((s) => [s.name.toUpperCase(), s.code])
);
const NAME_BY_CODE = new Map<StateCode, string>(STATES.map((s) => [s.code, s.name]));

const TWO_LETTERS = /^[A-Za-z]{2}$/;

function titleCase(s: string): string {
  return s
    .split(" ")
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(" ");
}

/**
 * Map whatever the warehouse calls a state ("NY", "NEW_YORK", "new  york",
 * "District of Columbia") to its postal code. Returns null when nothing
 * matches; callers drop such rows rather than guessing a code.
 */
export function toStateCode(input: string | null | undefined): StateCode | null {
  if (input == null) return null;

  const s = String(input).trim();
  if (TWO_LETTERS.test(s)) return s.toUpperCase();

  const normalized = s.replace(/_/g, " ").split(/\s+/).filter(Boolean).join(" ");
  if (!normalized) return null;

  const byTitle = BY_NAME.get(titleCase(normalized));
  if (byTitle) return byTitle;

  return BY_UPPER_NAME.get(normalized.toUpperCase()) ?? null;
}

/** Display name for a code; falls back to the code itself for 2-letter inputs outside the table. */
export function stateName(code: StateCode): string {
  return NAME_BY_CODE.get(code.toUpperCase()) ?? code.toUpperCase();
}
