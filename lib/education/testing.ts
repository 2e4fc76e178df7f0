// lib/education/testing.ts
// In-process warehouse stand-in for tests: answers queries by pattern.
import { DEFAULT_SETTINGS, type EducationSettings } from "@/lib/education/settings";
import { EducationSession } from "@/lib/education/session";
import { toResult, type QueryExecutor, type Row } from "@/lib/education/warehouse";

export type Route = {
  match: RegExp;
  rows: Row[] | ((sql: string) => Row[]);
};

export type FakeWarehouse = {
  executor: QueryExecutor;
  /** Every query text received, in order. */
  calls: string[];
  count: (match: RegExp) => number;
};

export function fakeWarehouse(routes: Route[]): FakeWarehouse {
  const calls: string[] = [];
  const executor: QueryExecutor = async (sql) => {
    calls.push(sql);
    const route = routes.find((r) => r.match.test(sql));
    if (!route) throw new Error(`fake warehouse: no route for query:\n${sql}`);
    return toResult(typeof route.rows === "function" ? route.rows(sql) : route.rows);
  };
  return {
    executor,
    calls,
    count: (match) => calls.filter((sql) => match.test(sql)).length,
  };
}

export const catalogRoute = (...tables: string[]): Route => ({
  match: /information_schema\.tables/,
  rows: tables.map((table_name) => ({ table_name })),
});

/** Single-quoted literals inside `state IN (...)`, unescaped. */
export function inListStates(sql: string): string[] {
  const list = /state IN \(([^)]*)\)/.exec(sql);
  if (!list) return [];
  return [...list[1].matchAll(/'((?:[^']|'')*)'/g)].map((m) => m[1].replace(/''/g, "'"));
}

export class FakeClock {
  constructor(public t = 0) {}
  now = () => this.t;
  advance(ms: number) {
    this.t += ms;
  }
}

export function testSession(
  executor: QueryExecutor,
  opts: { clock?: FakeClock; settings?: Partial<EducationSettings>; id?: string } = {}
): EducationSession {
  return new EducationSession(opts.id ?? "test", {
    executor,
    settings: { ...DEFAULT_SETTINGS, ...opts.settings },
    now: opts.clock?.now,
  });
}
