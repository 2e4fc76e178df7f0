// lib/education/http.ts
import { NextResponse } from "next/server";
import { InvalidInputError, errorMessage } from "@/lib/education/errors";
import { DEFAULT_METRIC, resolveMetric, type MetricKey } from "@/lib/education/metrics";

export function parseMetric(raw: string | null): MetricKey {
  if (raw === null || !raw.trim()) return DEFAULT_METRIC;
  const key = resolveMetric(raw);
  if (!key) throw new InvalidInputError(`Unknown metric: ${raw}`);
  return key;
}

/** Integer year or null when the parameter is absent. */
export function parseYear(raw: string | null): number | null {
  if (raw === null || !raw.trim()) return null;
  const y = Number(raw);
  if (!Number.isInteger(y) || y < 1000 || y > 9999) {
    throw new InvalidInputError("year must be a 4-digit integer");
  }
  return y;
}

export function errorResponse(tag: string, err: unknown) {
  if (err instanceof InvalidInputError) {
    return NextResponse.json({ error: err.message }, { status: 400 });
  }
  console.error(`[${tag}] failed:`, err);
  return NextResponse.json({ error: errorMessage(err) }, { status: 500 });
}
