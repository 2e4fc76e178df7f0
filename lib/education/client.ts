// lib/education/client.ts
import type { TrendComparison } from "@/lib/education/comparison";
import type { MetricKey, MetricUnit, VariantKind } from "@/lib/education/metrics";
import type { NationalBaselineProvenance } from "@/lib/education/national";
import type { Snapshot } from "@/lib/education/snapshot";
import type { YearRange } from "@/lib/education/source";

export type MetricOption = { key: MetricKey; label: string; unit: MetricUnit };

export type EducationMeta = {
  source: string;
  variant: VariantKind;
  provenance: NationalBaselineProvenance;
  metrics: MetricOption[];
  defaultMetric: MetricKey;
  years: YearRange | null;
  states: string[];
  defaultState: string | null;
};

export type SnapshotPayload = Snapshot & { source: string; variant: VariantKind };

const API = "/api/education";

type FetchOptions = { sessionId?: string; baseUrl?: string };

function query(params: Record<string, string | number | undefined>): string {
  const sp = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) sp.set(k, String(v));
  }
  const s = sp.toString();
  return s ? `?${s}` : "";
}

async function getJson<T>(path: string, opts: FetchOptions): Promise<T> {
  const res = await fetch(`${opts.baseUrl ?? ""}${API}${path}`, {
    cache: "no-store",
    headers: {
      Accept: "application/json",
      ...(opts.sessionId ? { "x-session-id": opts.sessionId } : {}),
    },
  });
  if (!res.ok) {
    const msg = await safeText(res);
    throw new Error(`GET ${API}${path} -> ${res.status} ${res.statusText}${msg ? `: ${msg}` : ""}`);
  }
  return (await res.json()) as T;
}

/** Source, metric options, year range and state list for the controls. */
export function fetchEducationMeta(opts: FetchOptions = {}): Promise<EducationMeta> {
  return getJson<EducationMeta>("/meta", opts);
}

/** Per-state values, KPIs and leaderboard for one metric and year. */
export function fetchSnapshot(
  metric: MetricKey,
  year?: number,
  opts: FetchOptions = {}
): Promise<SnapshotPayload> {
  return getJson<SnapshotPayload>(`/snapshot${query({ metric, year })}`, opts);
}

export function fetchTrend(
  metric: MetricKey,
  state?: string,
  year?: number,
  opts: FetchOptions = {}
): Promise<TrendComparison> {
  return getJson<TrendComparison>(`/trend${query({ metric, state, year })}`, opts);
}

async function safeText(res: Response): Promise<string | null> {
  try {
    return await res.text();
  } catch {
    return null;
  }
}
