// lib/education/metrics.ts

export type MetricUnit = "US$" | "US$/student";

export interface Metric {
  label: string;
  unit: MetricUnit;
  /** Column materialized in the curated view. */
  column: string;
  /** Same quantity computed inline from raw totals and enrollment. */
  rawExpr: string;
  /** Closest column/expression in the national summary view. */
  nationalExpr: string;
}

export const METRICS = {
  EXPENDITURE_PER_STUDENT: {
    label: "Expenditure per student",
    unit: "US$/student",
    column: "expenditure_per_student",
    rawExpr: "total_expenditure / NULLIF(enroll, 0)",
    nationalExpr: "national_spend_per_student",
  },
  REVENUE_PER_STUDENT: {
    label: "Revenue per student",
    unit: "US$/student",
    column: "revenue_per_student",
    rawExpr: "total_revenue / NULLIF(enroll, 0)",
    nationalExpr: "national_revenue / NULLIF(national_enrollment, 0)",
  },
  SURPLUS_DEFICIT: {
    label: "Surplus / Deficit",
    unit: "US$",
    column: "surplus_deficit",
    rawExpr: "total_revenue - total_expenditure",
    // total, not per student
    nationalExpr: "national_revenue - national_expenditure",
  },
  TOTAL_EXPENDITURE: {
    label: "Total Expenditure",
    unit: "US$",
    column: "total_expenditure",
    rawExpr: "total_expenditure",
    nationalExpr: "national_expenditure",
  },
  TOTAL_REVENUE: {
    label: "Total Revenue",
    unit: "US$",
    column: "total_revenue",
    rawExpr: "total_revenue",
    nationalExpr: "national_revenue",
  },
} as const satisfies Record<string, Metric>;

export type MetricKey = keyof typeof METRICS;

export const isMetricKey = (x: unknown): x is MetricKey =>
  typeof x === "string" && Object.prototype.hasOwnProperty.call(METRICS, x);

export const METRIC_KEYS: readonly MetricKey[] = Object.keys(METRICS).filter(isMetricKey);

export const DEFAULT_METRIC: MetricKey = "EXPENDITURE_PER_STUDENT";

/** Used when a metric has no counterpart in the national summary view. */
export const NATIONAL_FALLBACK_EXPR = METRICS.EXPENDITURE_PER_STUDENT.nationalExpr;

/** Accepts a key ("TOTAL_REVENUE") or a display label ("Total Revenue"), any casing. */
export function resolveMetric(input: string | null | undefined): MetricKey | null {
  const s = (input ?? "").trim();
  if (!s) return null;
  const upper = s.toUpperCase();
  if (isMetricKey(upper)) return upper;
  const lower = s.toLowerCase();
  return METRIC_KEYS.find((k) => METRICS[k].label.toLowerCase() === lower) ?? null;
}

/**
 * The two shapes the dataset comes in. Curated has the metrics and an integer
 * year already materialized; raw stores year as text and only has totals.
 */
export type SchemaVariant =
  | { kind: "curated"; relation: string }
  | { kind: "raw"; relation: string };

export type VariantKind = SchemaVariant["kind"];

type ExpressionStrategy = {
  metric: (key: MetricKey) => string;
  year: string;
};

const STRATEGIES: Record<VariantKind, ExpressionStrategy> = {
  curated: {
    metric: (key) => METRICS[key].column,
    year: "year",
  },
  raw: {
    metric: (key) => METRICS[key].rawExpr,
    year: "CAST(year AS integer)",
  },
};

export function metricExpression(variant: SchemaVariant, key: MetricKey): string {
  return STRATEGIES[variant.kind].metric(key);
}

export function yearExpression(variant: SchemaVariant): string {
  return STRATEGIES[variant.kind].year;
}

/** Year as a select-list item named `year`, without a redundant alias for the curated column. */
export function yearColumn(variant: SchemaVariant): string {
  const expr = yearExpression(variant);
  return expr === "year" ? expr : `${expr} AS year`;
}

export function nationalExpression(key: MetricKey | string): string {
  return isMetricKey(key) ? METRICS[key].nationalExpr : NATIONAL_FALLBACK_EXPR;
}
