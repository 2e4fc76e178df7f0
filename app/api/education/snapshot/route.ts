// app/api/education/snapshot/route.ts
import { NextResponse } from "next/server";
import { errorResponse, parseMetric, parseYear } from "@/lib/education/http";
import { sessionFor } from "@/lib/education/session";
import { loadSnapshot } from "@/lib/education/snapshot";
import { listYears, resolveSchemaVariant } from "@/lib/education/source";

export const dynamic = "force-dynamic";

const TAG = "/api/education/snapshot";

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const metric = parseMetric(searchParams.get("metric"));
    const requestedYear = parseYear(searchParams.get("year"));

    const session = sessionFor(req);
    const variant = await resolveSchemaVariant(session);
    const year = requestedYear ?? (await listYears(session, variant))?.max ?? null;
    if (year === null) {
      return NextResponse.json({ error: "No years available" }, { status: 404 });
    }

    const snapshot = await loadSnapshot(session, variant, metric, year);
    const { unresolvedStates, nullMetrics } = snapshot.dropped;
    if (unresolvedStates || nullMetrics) {
      console.warn(`[${TAG}] dropped rows:`, { metric, year, unresolvedStates, nullMetrics });
    }

    return NextResponse.json(
      { source: variant.relation, variant: variant.kind, ...snapshot },
      { status: 200 }
    );
  } catch (err: unknown) {
    return errorResponse(TAG, err);
  }
}
