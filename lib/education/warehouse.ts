// lib/education/warehouse.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { getSupabase } from "@/app/config/supabase-config";
import { WarehouseError } from "@/lib/education/errors";

export type Cell = string | number | boolean | null;
export type Row = Record<string, Cell>;

export type QueryResult = {
  /** Column names in the order of the first row. */
  columns: string[];
  rows: Row[];
};

/**
 * Runs exactly the given text. There is no parameter binding: anything
 * interpolated must already be a validated identifier, a number, or a
 * literal passed through `sqlString`.
 */
export type QueryExecutor = (sql: string) => Promise<QueryResult>;

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function toCell(v: unknown): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean") return v;
  return JSON.stringify(v);
}

export function toResult(data: unknown): QueryResult {
  const list = Array.isArray(data) ? data : [];
  const rows: Row[] = [];
  for (const r of list) {
    if (!isRecord(r)) continue;
    const row: Row = {};
    for (const [k, v] of Object.entries(r)) row[k] = toCell(v);
    rows.push(row);
  }
  return { columns: rows.length ? Object.keys(rows[0]) : [], rows };
}

/** Numeric cell or null. Postgres numeric comes back as a string. */
export function toNumber(v: Cell | undefined): number | null {
  const x =
    typeof v === "number"
      ? v
      : typeof v === "string" && v.trim() !== ""
      ? Number(v)
      : Number.NaN;
  return Number.isFinite(x) ? x : null;
}

export function toText(v: Cell | undefined): string | null {
  if (v === null || v === undefined) return null;
  return String(v);
}

/** Single-quoted SQL literal. */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Executor over the `warehouse_query(p_sql)` RPC (see supabase/warehouse_query.sql).
 * Transport and SQL errors surface as WarehouseError; no retries here.
 */
export function createSupabaseExecutor(
  client: () => SupabaseClient = getSupabase
): QueryExecutor {
  return async (sql) => {
    const { data, error } = await client().rpc("warehouse_query", { p_sql: sql });
    if (error) {
      throw new WarehouseError(`warehouse_query failed: ${error.message}`, sql, { cause: error });
    }
    return toResult(data);
  };
}
