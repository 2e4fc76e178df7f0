// lib/education/national.ts
import {
  metricExpression,
  nationalExpression,
  yearColumn,
  yearExpression,
  type MetricKey,
  type SchemaVariant,
} from "@/lib/education/metrics";
import type { EducationSession } from "@/lib/education/session";
import { hasRelation, resolvableStates } from "@/lib/education/source";
import { seriesFromRows, type TrendSeries } from "@/lib/education/trend";
import { sqlString } from "@/lib/education/warehouse";

/**
 * Where the national line comes from.
 * - "dedicated-summary": a national view with totals already summed per year
 *   (ratio metrics are ratio-of-sums).
 * - "computed-aggregate": AVG of the per-state metric per year over rows whose
 *   state identifier resolves (ratio metrics are average-of-ratios, unweighted
 *   by state size).
 * The two differ for skewed state sizes; both are accepted as "National".
 */
export type NationalBaselineProvenance = "dedicated-summary" | "computed-aggregate";

export const NATIONAL_LABEL = "National";

export async function resolveNationalProvenance(
  session: EducationSession
): Promise<NationalBaselineProvenance> {
  return (await hasRelation(session, session.settings.nationalSource))
    ? "dedicated-summary"
    : "computed-aggregate";
}

/**
 * `identifiers` are the catalog state identifiers the computed aggregate may
 * average over; the summary view ignores them.
 */
export function nationalSql(
  session: EducationSession,
  provenance: NationalBaselineProvenance,
  variant: SchemaVariant,
  metric: MetricKey,
  identifiers: readonly string[] = []
): string {
  if (provenance === "dedicated-summary") {
    return `
    SELECT year, ${nationalExpression(metric)} AS metric
    FROM ${session.relation(session.settings.nationalSource)}
    ORDER BY year
    `;
  }

  const yearExpr = yearExpression(variant);
  return `
    SELECT ${yearColumn(variant)}, AVG(${metricExpression(variant, metric)}) AS metric
    FROM ${session.relation(variant.relation)}
    WHERE state IN (${identifiers.map(sqlString).join(", ")})
    GROUP BY ${yearExpr}
    ORDER BY ${yearExpr}
  `;
}

export type NationalSeries = {
  provenance: NationalBaselineProvenance;
  series: TrendSeries;
  dropped: number;
};

/** One value per year regardless of provenance. */
export async function loadNationalSeries(
  session: EducationSession,
  variant: SchemaVariant,
  metric: MetricKey
): Promise<NationalSeries> {
  const provenance = await resolveNationalProvenance(session);

  let identifiers: string[] = [];
  if (provenance === "computed-aggregate") {
    identifiers = await resolvableStates(session, variant);
    if (!identifiers.length) {
      return { provenance, series: { seriesLabel: NATIONAL_LABEL, points: [] }, dropped: 0 };
    }
  }

  const res = await session.query(nationalSql(session, provenance, variant, metric, identifiers));
  const { series, dropped } = seriesFromRows(NATIONAL_LABEL, res.rows);
  return { provenance, series, dropped };
}
