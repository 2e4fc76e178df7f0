// app/api/education/meta/route.ts
import { NextResponse } from "next/server";
import { errorResponse } from "@/lib/education/http";
import { METRICS, METRIC_KEYS, DEFAULT_METRIC } from "@/lib/education/metrics";
import { resolveNationalProvenance } from "@/lib/education/national";
import { sessionFor } from "@/lib/education/session";
import {
  defaultState,
  listStates,
  listYears,
  resolveSchemaVariant,
} from "@/lib/education/source";

export const dynamic = "force-dynamic";

export async function GET(req: Request) {
  try {
    const session = sessionFor(req);
    const variant = await resolveSchemaVariant(session);
    const provenance = await resolveNationalProvenance(session);
    const years = await listYears(session, variant);
    const states = await listStates(session, variant);

    return NextResponse.json(
      {
        source: variant.relation,
        variant: variant.kind,
        provenance,
        metrics: METRIC_KEYS.map((key) => ({
          key,
          label: METRICS[key].label,
          unit: METRICS[key].unit,
        })),
        defaultMetric: DEFAULT_METRIC,
        years,
        states,
        defaultState: defaultState(states),
      },
      { status: 200 }
    );
  } catch (err: unknown) {
    return errorResponse("/api/education/meta", err);
  }
}
