import { NextResponse } from "next/server";
import { getConfig } from "@/lib/config";

export const runtime = "nodejs";

/**
 * Liveness check. Reports which upstream hosts this process talks to, so a
 * misconfigured WX_*_URL shows up without running a briefing.
 */
export async function GET() {
  try {
    const config = getConfig();
    return NextResponse.json({
      ok: true,
      timestamp: new Date().toISOString(),
      upstreams: {
        weather: new URL(config.weatherUrl).host,
        datis: new URL(config.datisUrl).host,
        status: new URL(config.statusUrl).host,
      },
      cacheTtlSeconds: config.cacheTtlSeconds,
    });
  } catch (error) {
    console.error("Health check error:", error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return NextResponse.json({ ok: false, error: message }, { status: 500 });
  }
}
