"use client";

import type { AirportBriefing, BriefingResult, BriefingRole } from "@/types/briefing";
import { formatIsoAsUtc } from "@/lib/time-format";

type InfoKind = "datis" | "status";

interface AirportInfoPanelProps {
  kind: InfoKind;
  result: BriefingResult;
}

const ROLE_LABELS: Record<BriefingRole, string> = {
  departure: "Departure",
  arrival: "Arrival",
  alternate: "Alternate",
};

const KIND_TITLES: Record<InfoKind, string> = {
  datis: "DATIS",
  status: "Airport Status",
};

function blockText(kind: InfoKind, airport: AirportBriefing): string {
  if (kind === "datis") {
    return airport.datis.ok ? airport.datis.value : airport.datis.error;
  }
  return airport.status.ok ? airport.status.value.text : `Error: ${airport.status.error}`;
}

/**
 * One plain-text block per requested airport, in role order
 */
export function AirportInfoPanel({ kind, result }: AirportInfoPanelProps) {
  const { departure, arrival, alternate } = result.airports;
  const airports = alternate ? [departure, arrival, alternate] : [departure, arrival];
  const title = KIND_TITLES[kind];

  return (
    <section aria-label={title} className="space-y-2">
      <h2 className="text-sm font-semibold text-slate-700">{title}:</h2>

      <div className="space-y-4 rounded-md border border-slate-200 bg-white p-4 text-sm">
        {airports.map((airport) => (
          <div key={airport.role} data-testid={`${kind}-${airport.role}`}>
            <p className="font-semibold">
              {ROLE_LABELS[airport.role]} {title} ({airport.input}):
            </p>
            <pre className="whitespace-pre-wrap font-mono text-slate-700">
              {blockText(kind, airport)}
            </pre>
          </div>
        ))}

        <p className="text-xs italic text-slate-500">
          Data retrieved at {formatIsoAsUtc(result.retrievedAt)}
        </p>
      </div>
    </section>
  );
}
