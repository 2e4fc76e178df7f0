// lib/education/comparison.ts
import { InvalidInputError } from "@/lib/education/errors";
import {
  metricExpression,
  yearColumn,
  yearExpression,
  type MetricKey,
  type SchemaVariant,
} from "@/lib/education/metrics";
import {
  loadNationalSeries,
  type NationalBaselineProvenance,
} from "@/lib/education/national";
import type { EducationSession } from "@/lib/education/session";
import { resolvableStates } from "@/lib/education/source";
import { stateName, toStateCode, type StateCode } from "@/lib/education/states";
import {
  reconcileTrends,
  seriesFromRows,
  type ReconciledTrend,
  type TrendSeries,
} from "@/lib/education/trend";
import { sqlString } from "@/lib/education/warehouse";

export type TrendComparison = ReconciledTrend & {
  metric: MetricKey;
  stateCode: StateCode;
  provenance: NationalBaselineProvenance;
  state: TrendSeries;
  national: TrendSeries;
  /** Query rows skipped for a missing year or value, per series. */
  dropped: { state: number; national: number };
};

export function stateSeriesSql(
  session: EducationSession,
  variant: SchemaVariant,
  metric: MetricKey,
  identifiers: readonly string[]
): string {
  const yearExpr = yearExpression(variant);
  return `
    SELECT ${yearColumn(variant)}, ${metricExpression(variant, metric)} AS metric
    FROM ${session.relation(variant.relation)}
    WHERE state IN (${identifiers.map(sqlString).join(", ")})
    ORDER BY ${yearExpr}
  `;
}

/**
 * Selected state vs national for one metric. The state is normalized first and
 * only catalog identifiers that normalize to the same code reach the query
 * text, never the request value itself.
 */
export async function loadTrend(
  session: EducationSession,
  variant: SchemaVariant,
  metric: MetricKey,
  stateInput: string,
  selectedYear: number
): Promise<TrendComparison> {
  const stateCode = toStateCode(stateInput);
  if (!stateCode) throw new InvalidInputError(`Unknown state: ${stateInput}`);

  const identifiers = await resolvableStates(session, variant, stateCode);

  const label = stateName(stateCode);
  let state: TrendSeries = { seriesLabel: label, points: [] };
  let stateDropped = 0;
  if (identifiers.length) {
    const res = await session.query(stateSeriesSql(session, variant, metric, identifiers));
    ({ series: state, dropped: stateDropped } = seriesFromRows(label, res.rows));
  }

  const national = await loadNationalSeries(session, variant, metric);

  return {
    ...reconcileTrends(state, national.series, selectedYear),
    metric,
    stateCode,
    provenance: national.provenance,
    state,
    national: national.series,
    dropped: { state: stateDropped, national: national.dropped },
  };
}
