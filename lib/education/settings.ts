// lib/education/settings.ts
import { ConfigurationError } from "@/lib/education/errors";

export type EducationSettings = {
  /** Warehouse schema holding every relation below. */
  schema: string;
  curatedSource: string;
  rawSource: string;
  nationalSource: string;
  metadataTtlMs: number;
  queryTtlMs: number;
};

export const DEFAULT_SETTINGS: EducationSettings = {
  schema: "us_education_curated",
  curatedSource: "v_state_year_metrics",
  rawSource: "states_all",
  nationalSource: "v_national_summary",
  metadataTtlMs: 60 * 60 * 1000,
  queryTtlMs: 15 * 60 * 1000,
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function identifier(name: string, value: string | undefined, fallback: string): string {
  const v = (value ?? "").trim() || fallback;
  if (!IDENTIFIER.test(v)) {
    throw new ConfigurationError(`${name} must be a plain SQL identifier, got "${v}"`);
  }
  return v;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Settings come from the environment with defaults for everything. Identifiers
 * end up inside query text, so anything that is not a bare identifier is a
 * configuration error.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): EducationSettings {
  const d = DEFAULT_SETTINGS;
  return {
    schema: identifier("EDU_SCHEMA", env.EDU_SCHEMA, d.schema),
    curatedSource: identifier("EDU_CURATED_SOURCE", env.EDU_CURATED_SOURCE, d.curatedSource),
    rawSource: identifier("EDU_RAW_SOURCE", env.EDU_RAW_SOURCE, d.rawSource),
    nationalSource: identifier("EDU_NATIONAL_SOURCE", env.EDU_NATIONAL_SOURCE, d.nationalSource),
    metadataTtlMs: positiveInt(env.EDU_METADATA_TTL_MS, d.metadataTtlMs),
    queryTtlMs: positiveInt(env.EDU_QUERY_TTL_MS, d.queryTtlMs),
  };
}
