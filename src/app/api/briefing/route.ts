/**
 * Briefing API Route
 *
 * POST /api/briefing  { departure, arrival, alternate? }
 * GET  /api/briefing?departure=JFK&arrival=LAX&alternate=EWR
 *
 * Always answers 200 once the codes are valid: upstream failures are
 * reported per field inside the briefing.
 */

import { NextResponse } from "next/server";
import { z } from "zod";

import { buildBriefing, createBriefingCaches } from "@/lib/briefing";
import { InvalidCodeError } from "@/lib/briefing-errors";
import { getConfig } from "@/lib/config";
import { createWxSources } from "@/lib/wx-sources";

export const runtime = "nodejs";

// Shared by every request in this process
const briefingCaches = createBriefingCaches();

const codeSchema = z.string().trim().max(4, "must be 3 or 4 letters");

const briefingRequestSchema = z.object({
  departure: codeSchema.min(1, "Departure airport is required"),
  arrival: codeSchema.min(1, "Arrival airport is required"),
  alternate: codeSchema.optional(),
});

async function handleBriefing(rawBody: unknown) {
  const parseResult = briefingRequestSchema.safeParse(rawBody);
  if (!parseResult.success) {
    const firstError = parseResult.error.issues[0];
    const fieldPath = firstError.path.join(".");
    const message = fieldPath
      ? `${fieldPath}: ${firstError.message}`
      : firstError.message;
    return NextResponse.json({ error: message }, { status: 400 });
  }

  try {
    const config = getConfig();
    const briefing = await buildBriefing(parseResult.data, {
      sources: createWxSources(config),
      caches: briefingCaches,
      cacheTtlSeconds: config.cacheTtlSeconds,
    });
    return NextResponse.json(briefing);
  } catch (error) {
    if (error instanceof InvalidCodeError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    console.error("Briefing error:", error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return NextResponse.json(
      { error: `Briefing failed: ${message}` },
      { status: 500 }
    );
  }
}

export async function POST(request: Request) {
  let rawBody: unknown;
  try {
    rawBody = await request.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }
  return handleBriefing(rawBody);
}

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  return handleBriefing({
    departure: searchParams.get("departure") ?? "",
    arrival: searchParams.get("arrival") ?? "",
    alternate: searchParams.get("alternate") ?? undefined,
  });
}
