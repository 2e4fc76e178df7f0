// lib/education/snapshot.ts
import {
  metricExpression,
  yearColumn,
  yearExpression,
  type MetricKey,
  type SchemaVariant,
} from "@/lib/education/metrics";
import type { EducationSession } from "@/lib/education/session";
import { toStateCode, type StateCode } from "@/lib/education/states";
import { toNumber, toText, type Row } from "@/lib/education/warehouse";

export type StateRecord = {
  rawIdentifier: string;
  canonicalCode: StateCode;
  year: number;
  metricValue: number | null;
  enrollment: number | null;
  totalRevenue: number | null;
  totalExpenditure: number | null;
};

/** A record the map and leaderboard can draw: resolved code and a metric value. */
export type MapRow = StateRecord & { metricValue: number };

export type SnapshotStats = {
  statesInView: number;
  mean: number | null;
  max: number | null;
  min: number | null;
};

export type LeaderboardEntry = {
  rawIdentifier: string;
  canonicalCode: StateCode;
  value: number;
};

export type DropCounts = {
  /** Rows whose state identifier matched no code. */
  unresolvedStates: number;
  /** Resolved rows without a metric value; kept in `records`, left out of `mapRows`. */
  nullMetrics: number;
};

export type Snapshot = {
  metric: MetricKey;
  year: number;
  /** Every resolved record, including those with a null metric. */
  records: StateRecord[];
  /** Chart-eligible rows only. */
  mapRows: MapRow[];
  stats: SnapshotStats;
  top: LeaderboardEntry[];
  bottom: LeaderboardEntry[];
  dropped: DropCounts;
};

export const LEADERBOARD_SIZE = 10;

export function snapshotSql(
  session: EducationSession,
  variant: SchemaVariant,
  metric: MetricKey,
  year: number
): string {
  const yearExpr = yearExpression(variant);
  return `
    SELECT state,
           ${yearColumn(variant)},
           ${metricExpression(variant, metric)} AS metric,
           enroll, total_revenue, total_expenditure
    FROM ${session.relation(variant.relation)}
    WHERE ${yearExpr} = ${Math.trunc(year)}
  `;
}

/**
 * Normalize identifiers and drop the rows that have none. Unresolvable rows
 * never get a default code.
 */
export function toStateRecords(
  rows: readonly Row[],
  fallbackYear: number
): { records: StateRecord[]; unresolved: number } {
  const records: StateRecord[] = [];
  let unresolved = 0;

  for (const r of rows) {
    const rawIdentifier = toText(r.state);
    const canonicalCode = toStateCode(rawIdentifier);
    if (rawIdentifier === null || canonicalCode === null) {
      unresolved += 1;
      continue;
    }
    const year = toNumber(r.year);
    records.push({
      rawIdentifier,
      canonicalCode,
      year: year === null ? fallbackYear : Math.trunc(year),
      metricValue: toNumber(r.metric),
      enrollment: toNumber(r.enroll),
      totalRevenue: toNumber(r.total_revenue),
      totalExpenditure: toNumber(r.total_expenditure),
    });
  }

  return { records, unresolved };
}

export function chartRows(records: readonly StateRecord[]): MapRow[] {
  const rows: MapRow[] = [];
  for (const r of records) {
    if (r.metricValue !== null) rows.push({ ...r, metricValue: r.metricValue });
  }
  return rows;
}

/** Mean/max/min over metric values that exist; states in view counts every resolved record. */
export function summarize(records: readonly StateRecord[]): SnapshotStats {
  const values = records
    .map((r) => r.metricValue)
    .filter((v): v is number => v !== null);
  const statesInView = new Set(records.map((r) => r.rawIdentifier)).size;

  if (!values.length) return { statesInView, mean: null, max: null, min: null };

  const total = values.reduce((acc, v) => acc + v, 0);
  return {
    statesInView,
    mean: total / values.length,
    max: Math.max(...values),
    min: Math.min(...values),
  };
}

export function leaderboard(
  records: readonly StateRecord[],
  order: "desc" | "asc",
  size = LEADERBOARD_SIZE
): LeaderboardEntry[] {
  const entries: LeaderboardEntry[] = [];
  for (const r of records) {
    if (r.metricValue === null) continue;
    entries.push({
      rawIdentifier: r.rawIdentifier,
      canonicalCode: r.canonicalCode,
      value: r.metricValue,
    });
  }
  const sign = order === "desc" ? -1 : 1;
  return entries
    .sort((a, b) => sign * (a.value - b.value) || a.canonicalCode.localeCompare(b.canonicalCode))
    .slice(0, size);
}

export async function loadSnapshot(
  session: EducationSession,
  variant: SchemaVariant,
  metric: MetricKey,
  year: number
): Promise<Snapshot> {
  const res = await session.query(snapshotSql(session, variant, metric, year));
  const { records, unresolved } = toStateRecords(res.rows, year);
  const mapRows = chartRows(records);

  return {
    metric,
    year,
    records,
    mapRows,
    stats: summarize(records),
    top: leaderboard(records, "desc"),
    bottom: leaderboard(records, "asc"),
    dropped: {
      unresolvedStates: unresolved,
      nullMetrics: records.length - mapRows.length,
    },
  };
}
