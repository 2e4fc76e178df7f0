// lib/education/trend.ts
import type { Row } from "@/lib/education/warehouse";
import { toNumber } from "@/lib/education/warehouse";

export type TrendPoint = { year: number; value: number };

export type TrendSeries = {
  seriesLabel: string;
  /** Ascending by year, at most one point per year. */
  points: TrendPoint[];
};

export type TrendRow = TrendPoint & { series: string };

export type ReconciledTrend = {
  /** Both series in one list, ordered by year; state rows before national within a year. */
  rows: TrendRow[];
  selectedYear: number;
  /** state − national for the selected year, null when either side has no value. */
  delta: number | null;
  stateValue: number | null;
  nationalValue: number | null;
};

/**
 * Turn query rows into a series. Rows without a usable year or value are
 * skipped; a year reported more than once is collapsed to the mean.
 * `dropped` counts the skipped rows.
 */
export function seriesFromRows(
  seriesLabel: string,
  rows: readonly Row[],
  yearKey = "year",
  valueKey = "metric"
): { series: TrendSeries; dropped: number } {
  const sums = new Map<number, { total: number; n: number }>();
  let dropped = 0;

  for (const r of rows) {
    const year = toNumber(r[yearKey]);
    const value = toNumber(r[valueKey]);
    if (year === null || value === null) {
      dropped += 1;
      continue;
    }
    const y = Math.trunc(year);
    const acc = sums.get(y) ?? { total: 0, n: 0 };
    acc.total += value;
    acc.n += 1;
    sums.set(y, acc);
  }

  const points = [...sums.entries()]
    .map(([year, { total, n }]) => ({ year, value: total / n }))
    .sort((a, b) => a.year - b.year);

  return { series: { seriesLabel, points }, dropped };
}

function usable(p: TrendPoint): boolean {
  return Number.isFinite(p.year) && Number.isFinite(p.value);
}

function valueAt(series: TrendSeries, year: number): number | null {
  return series.points.find((p) => p.year === year && usable(p))?.value ?? null;
}

/**
 * Merge the selected state's series with the national one for a dual-line
 * chart. No interpolation and no zero fill: a year only shows up in the
 * series that reported it.
 */
export function reconcileTrends(
  state: TrendSeries,
  national: TrendSeries,
  selectedYear: number
): ReconciledTrend {
  const tagged = (s: TrendSeries, order: number) =>
    s.points.filter(usable).map((p) => ({ ...p, series: s.seriesLabel, order }));

  const rows: TrendRow[] = [...tagged(state, 0), ...tagged(national, 1)]
    .sort((a, b) => a.year - b.year || a.order - b.order)
    .map(({ year, value, series }) => ({ year, value, series }));

  const stateValue = valueAt(state, selectedYear);
  const nationalValue = valueAt(national, selectedYear);
  const delta =
    stateValue !== null && nationalValue !== null ? stateValue - nationalValue : null;

  return { rows, selectedYear, delta, stateValue, nationalValue };
}
