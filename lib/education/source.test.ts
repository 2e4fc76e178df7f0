import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@/lib/education/errors";
import {
  defaultState,
  hasRelation,
  listStates,
  listYears,
  resolveSchemaVariant,
} from "@/lib/education/source";
import { FakeClock, catalogRoute, fakeWarehouse, testSession } from "@/lib/education/testing";

const CATALOG = /information_schema\.tables/;
const HOUR = 60 * 60 * 1000;

describe("resolveSchemaVariant", () => {
  it("prefers the curated view when the catalog lists it", async () => {
    const wh = fakeWarehouse([catalogRoute("states_all", "V_STATE_YEAR_METRICS")]);
    const variant = await resolveSchemaVariant(testSession(wh.executor));
    expect(variant).toEqual({ kind: "curated", relation: "v_state_year_metrics" });
  });

  it("falls back to the raw table otherwise", async () => {
    const wh = fakeWarehouse([catalogRoute("states_all")]);
    const variant = await resolveSchemaVariant(testSession(wh.executor));
    expect(variant).toEqual({ kind: "raw", relation: "states_all" });
  });

  it("queries the configured schema", async () => {
    const wh = fakeWarehouse([catalogRoute()]);
    await resolveSchemaVariant(testSession(wh.executor, { settings: { schema: "edu_test" } }));
    expect(wh.calls[0]).toContain("table_schema = 'edu_test'");
  });

  it("looks the catalog up once per metadata window", async () => {
    const clock = new FakeClock();
    const wh = fakeWarehouse([catalogRoute("states_all")]);
    const session = testSession(wh.executor, { clock });

    await resolveSchemaVariant(session);
    await hasRelation(session, "v_national_summary");
    clock.advance(HOUR - 1);
    await resolveSchemaVariant(session);
    expect(wh.count(CATALOG)).toBe(1);

    clock.advance(1);
    await resolveSchemaVariant(session);
    expect(wh.count(CATALOG)).toBe(2);
  });

  it("does not share resolved state between sessions", async () => {
    const wh = fakeWarehouse([catalogRoute("states_all")]);
    await resolveSchemaVariant(testSession(wh.executor, { id: "a" }));
    await resolveSchemaVariant(testSession(wh.executor, { id: "b" }));
    expect(wh.count(CATALOG)).toBe(2);
  });

  it("turns a failed catalog lookup into a configuration error", async () => {
    const wh = fakeWarehouse([]);
    const err = await resolveSchemaVariant(testSession(wh.executor)).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err).toHaveProperty("message", "Catalog lookup failed for schema us_education_curated");
  });
});

describe("catalog listings", () => {
  it("lists distinct integer years with the raw cast", async () => {
    const wh = fakeWarehouse([
      { match: /SELECT DISTINCT CAST\(year AS integer\) AS year/, rows: [{ year: "2017" }, { year: 2015 }, { year: null }, { year: "2016" }] },
    ]);
    const years = await listYears(testSession(wh.executor), { kind: "raw", relation: "states_all" });
    expect(years).toEqual({ all: [2015, 2016, 2017], min: 2015, max: 2017 });
    expect(wh.calls[0]).toContain("FROM us_education_curated.states_all");
  });

  it("refreshes years on the data query window", async () => {
    const clock = new FakeClock();
    const wh = fakeWarehouse([{ match: /DISTINCT year/, rows: [{ year: 2019 }] }]);
    const session = testSession(wh.executor, { clock });
    const curated = { kind: "curated", relation: "v_state_year_metrics" } as const;

    await listYears(session, curated);
    clock.advance(15 * 60 * 1000 - 1);
    await listYears(session, curated);
    expect(wh.calls).toHaveLength(1);

    clock.advance(1);
    await listYears(session, curated);
    expect(wh.calls).toHaveLength(2);
  });

  it("returns null when there are no years", async () => {
    const wh = fakeWarehouse([{ match: /DISTINCT year/, rows: [] }]);
    const years = await listYears(testSession(wh.executor), {
      kind: "curated",
      relation: "v_state_year_metrics",
    });
    expect(years).toBeNull();
  });

  it("lists raw state identifiers and picks New York as the default", async () => {
    const wh = fakeWarehouse([
      { match: /DISTINCT state/, rows: [{ state: "OHIO" }, { state: "ALABAMA" }, { state: null }, { state: "NEW_YORK" }] },
    ]);
    const states = await listStates(testSession(wh.executor), { kind: "raw", relation: "states_all" });
    expect(states).toEqual(["ALABAMA", "NEW_YORK", "OHIO"]);
    expect(defaultState(states)).toBe("NEW_YORK");
    expect(defaultState(["OHIO", "ALABAMA"])).toBe("OHIO");
    expect(defaultState(["BUREAU_OF_INDIAN_EDUCATION", "OHIO"])).toBe("OHIO");
    expect(defaultState(["DODEA", "BIE"])).toBeNull();
    expect(defaultState([])).toBeNull();
  });
});
