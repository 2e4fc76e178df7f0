// app/api/education/trend/route.ts
import { NextResponse } from "next/server";
import { loadTrend } from "@/lib/education/comparison";
import { errorResponse, parseMetric, parseYear } from "@/lib/education/http";
import { sessionFor } from "@/lib/education/session";
import {
  defaultState,
  listStates,
  listYears,
  resolveSchemaVariant,
} from "@/lib/education/source";

export const dynamic = "force-dynamic";

const TAG = "/api/education/trend";

export async function GET(req: Request) {
  try {
    const { searchParams } = new URL(req.url);
    const metric = parseMetric(searchParams.get("metric"));
    const requestedYear = parseYear(searchParams.get("year"));
    const requestedState = (searchParams.get("state") || "").trim();

    const session = sessionFor(req);
    const variant = await resolveSchemaVariant(session);

    const state = requestedState || defaultState(await listStates(session, variant));
    const year = requestedYear ?? (await listYears(session, variant))?.max ?? null;
    if (state === null || year === null) {
      return NextResponse.json({ error: "No data available" }, { status: 404 });
    }

    const trend = await loadTrend(session, variant, metric, state, year);
    if (trend.dropped.state || trend.dropped.national) {
      console.warn(`[${TAG}] dropped rows:`, {
        metric,
        stateCode: trend.stateCode,
        dropped: trend.dropped,
      });
    }

    return NextResponse.json(trend, { status: 200 });
  } catch (err: unknown) {
    return errorResponse(TAG, err);
  }
}
