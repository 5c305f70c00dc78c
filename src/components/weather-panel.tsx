"use client";

import { Fragment } from "react";
import type { FieldResult, WeatherGroup } from "@/types/briefing";
import { formatIsoAsUtc } from "@/lib/time-format";

interface WeatherPanelProps {
  weather: FieldResult<WeatherGroup[]>;
  retrievedAt: string;
}

/**
 * METAR/TAF lines coloured by flight category, one block per airport
 */
export function WeatherPanel({ weather, retrievedAt }: WeatherPanelProps) {
  return (
    <section aria-labelledby="weather-heading" className="space-y-2">
      <h2 id="weather-heading" className="text-sm font-semibold text-slate-700">
        METAR / TAF:
      </h2>

      <div className="rounded-md border border-slate-200 bg-white p-4 font-mono text-sm">
        {weather.ok ? (
          weather.value.map((group, index) => (
            <Fragment key={`${group.airport ?? "unknown"}-${index}`}>
              {index > 0 && <hr className="my-3 border-slate-200" />}
              {group.airport && <p className="mb-1 font-bold">{group.airport}</p>}
              {group.lines.map((line, lineIndex) => (
                <p
                  key={lineIndex}
                  data-category={line.category}
                  style={{ color: line.color }}
                  className="whitespace-pre-wrap"
                >
                  {line.raw}
                </p>
              ))}
            </Fragment>
          ))
        ) : (
          <p className="text-red-600">{weather.error}</p>
        )}

        <p className="mt-4 font-sans text-xs italic text-slate-500">
          Data retrieved at {formatIsoAsUtc(retrievedAt)}
        </p>
      </div>
    </section>
  );
}
