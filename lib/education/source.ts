// lib/education/source.ts
import { ConfigurationError } from "@/lib/education/errors";
import { yearColumn, type SchemaVariant } from "@/lib/education/metrics";
import type { EducationSession } from "@/lib/education/session";
import { toStateCode, type StateCode } from "@/lib/education/states";
import { sqlString, toNumber, toText } from "@/lib/education/warehouse";

export function catalogSql(schema: string): string {
  return `
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = ${sqlString(schema)}
  `;
}

/** Lowercased names of every table and view in the configured schema. */
export async function listRelations(session: EducationSession): Promise<Set<string>> {
  try {
    const res = await session.metadata(catalogSql(session.settings.schema));
    const names = new Set<string>();
    for (const row of res.rows) {
      const name = toText(row.table_name);
      if (name) names.add(name.toLowerCase());
    }
    return names;
  } catch (err) {
    throw new ConfigurationError(
      `Catalog lookup failed for schema ${session.settings.schema}`,
      { cause: err }
    );
  }
}

export async function hasRelation(session: EducationSession, name: string): Promise<boolean> {
  const names = await listRelations(session);
  return names.has(name.toLowerCase());
}

/** Curated view when the catalog lists it, raw table otherwise. */
export async function resolveSchemaVariant(session: EducationSession): Promise<SchemaVariant> {
  const { curatedSource, rawSource } = session.settings;
  return (await hasRelation(session, curatedSource))
    ? { kind: "curated", relation: curatedSource }
    : { kind: "raw", relation: rawSource };
}

export type YearRange = { all: number[]; min: number; max: number };

export async function listYears(
  session: EducationSession,
  variant: SchemaVariant
): Promise<YearRange | null> {
  const res = await session.query(`
    SELECT DISTINCT ${yearColumn(variant)}
    FROM ${session.relation(variant.relation)}
    ORDER BY year
  `);

  const all = [
    ...new Set(
      res.rows
        .map((r) => toNumber(r.year))
        .filter((y): y is number => y !== null)
        .map((y) => Math.trunc(y))
    ),
  ].sort((a, b) => a - b);

  if (!all.length) return null;
  return { all, min: all[0], max: all[all.length - 1] };
}

/** Raw state identifiers exactly as stored, sorted, nulls dropped. */
export async function listStates(
  session: EducationSession,
  variant: SchemaVariant
): Promise<string[]> {
  const res = await session.metadata(`
    SELECT DISTINCT state
    FROM ${session.relation(variant.relation)}
    ORDER BY state
  `);
  return res.rows
    .map((r) => toText(r.state))
    .filter((s): s is string => s !== null)
    .sort((a, b) => a.localeCompare(b));
}

/** Drill-down default: whichever identifier means New York, else the first one that resolves. */
export function defaultState(states: readonly string[]): string | null {
  return (
    states.find((s) => toStateCode(s) === "NY") ??
    states.find((s) => toStateCode(s) !== null) ??
    null
  );
}

/** Catalog identifiers that normalize to a state code, optionally one code only. */
export async function resolvableStates(
  session: EducationSession,
  variant: SchemaVariant,
  code?: StateCode
): Promise<string[]> {
  const states = await listStates(session, variant);
  return states.filter((s) => {
    const c = toStateCode(s);
    return c !== null && (code === undefined || c === code);
  });
}
