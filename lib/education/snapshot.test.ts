import { describe, expect, it } from "vitest";
import type { SchemaVariant } from "@/lib/education/metrics";
import {
  chartRows,
  leaderboard,
  loadSnapshot,
  snapshotSql,
  summarize,
  toStateRecords,
} from "@/lib/education/snapshot";
import { fakeWarehouse, testSession } from "@/lib/education/testing";

const raw: SchemaVariant = { kind: "raw", relation: "states_all" };
const curated: SchemaVariant = { kind: "curated", relation: "v_state_year_metrics" };

const squash = (sql: string) => sql.replace(/\s+/g, " ").trim();

const ROWS = [
  { state: "ALABAMA", year: "2019", metric: 9000, enroll: 700000, total_revenue: 7, total_expenditure: 6 },
  { state: "new_york", year: "2019", metric: 25000, enroll: 2600000, total_revenue: 70, total_expenditure: 65 },
  { state: "TX", year: "2019", metric: "11000", enroll: null, total_revenue: 60, total_expenditure: 61 },
  { state: "VERMONT", year: "2019", metric: null, enroll: 0, total_revenue: 2, total_expenditure: 2 },
  { state: "DODEA", year: "2019", metric: 99999, enroll: 70000, total_revenue: 3, total_expenditure: 3 },
  { state: null, year: "2019", metric: 1, enroll: 1, total_revenue: 1, total_expenditure: 1 },
];

describe("snapshotSql", () => {
  it("casts the year in both select and filter for raw rows", () => {
    expect(squash(snapshotSql(testSession(fakeWarehouse([]).executor), raw, "REVENUE_PER_STUDENT", 2019))).toBe(
      "SELECT state, CAST(year AS integer) AS year, total_revenue / NULLIF(enroll, 0) AS metric, " +
        "enroll, total_revenue, total_expenditure FROM us_education_curated.states_all " +
        "WHERE CAST(year AS integer) = 2019"
    );
  });

  it("uses the materialized column for the curated view", () => {
    expect(squash(snapshotSql(testSession(fakeWarehouse([]).executor), curated, "SURPLUS_DEFICIT", 2010))).toBe(
      "SELECT state, year, surplus_deficit AS metric, " +
        "enroll, total_revenue, total_expenditure FROM us_education_curated.v_state_year_metrics " +
        "WHERE year = 2010"
    );
  });
});

describe("toStateRecords", () => {
  it("drops rows whose state does not resolve instead of defaulting a code", () => {
    const { records, unresolved } = toStateRecords(ROWS, 2019);
    expect(unresolved).toBe(2);
    expect(records.map((r) => r.canonicalCode)).toEqual(["AL", "NY", "TX", "VT"]);
    expect(records[2]).toEqual({
      rawIdentifier: "TX",
      canonicalCode: "TX",
      year: 2019,
      metricValue: 11000,
      enrollment: null,
      totalRevenue: 60,
      totalExpenditure: 61,
    });
  });
});

describe("summarize", () => {
  it("ignores null metrics in mean, max and min", () => {
    const { records } = toStateRecords(ROWS, 2019);
    expect(summarize(records)).toEqual({ statesInView: 4, mean: 15000, max: 25000, min: 9000 });
  });

  it("is unaffected by unresolvable rows and row order", () => {
    const resolvedOnly = toStateRecords(ROWS.filter((r) => r.state !== "DODEA" && r.state !== null), 2019);
    const shuffled = toStateRecords([...ROWS].reverse(), 2019);
    expect(summarize(shuffled.records)).toEqual(summarize(resolvedOnly.records));
  });

  it("reports null stats when no value exists", () => {
    expect(summarize([])).toEqual({ statesInView: 0, mean: null, max: null, min: null });
  });
});

describe("chartRows", () => {
  it("keeps only records with a metric value", () => {
    const { records } = toStateRecords(ROWS, 2019);
    const rows = chartRows(records);
    expect(rows.map((r) => r.rawIdentifier)).toEqual(["ALABAMA", "new_york", "TX"]);
    expect(rows.some((r) => r.canonicalCode === "VT")).toBe(false);
  });
});

describe("leaderboard", () => {
  it("ranks non-null values both ways", () => {
    const { records } = toStateRecords(ROWS, 2019);
    expect(leaderboard(records, "desc").map((e) => e.canonicalCode)).toEqual(["NY", "TX", "AL"]);
    expect(leaderboard(records, "asc", 2).map((e) => e.value)).toEqual([9000, 11000]);
  });
});

describe("loadSnapshot", () => {
  it("reports what was dropped", async () => {
    const wh = fakeWarehouse([{ match: /WHERE CAST\(year AS integer\) = 2019/, rows: ROWS }]);
    const snap = await loadSnapshot(testSession(wh.executor), raw, "EXPENDITURE_PER_STUDENT", 2019);
    expect(snap.records).toHaveLength(4);
    expect(snap.dropped).toEqual({ unresolvedStates: 2, nullMetrics: 1 });
    expect(snap.mapRows.map((r) => [r.canonicalCode, r.metricValue])).toEqual([
      ["AL", 9000],
      ["NY", 25000],
      ["TX", 11000],
    ]);
    expect(snap.top[0]).toEqual({ rawIdentifier: "new_york", canonicalCode: "NY", value: 25000 });
    expect(snap.bottom[0].canonicalCode).toBe("AL");
  });

  it("reuses a cached result for the same query", async () => {
    const wh = fakeWarehouse([{ match: /WHERE/, rows: ROWS }]);
    const session = testSession(wh.executor);
    await loadSnapshot(session, raw, "TOTAL_REVENUE", 2019);
    await loadSnapshot(session, raw, "TOTAL_REVENUE", 2019);
    await loadSnapshot(session, raw, "TOTAL_REVENUE", 2018);
    expect(wh.calls).toHaveLength(2);
  });
});
