"use client";

import * as React from "react";

import { AirportInfoPanel } from "@/components/airport-info-panel";
import { AutoRefreshControl } from "@/components/auto-refresh-control";
import { BriefingForm } from "@/components/briefing-form";
import { FormError } from "@/components/form-error";
import { WeatherPanel } from "@/components/weather-panel";
import type { BriefingRequest, BriefingResult } from "@/types/briefing";

const emptyRequest: BriefingRequest = {
  departure: "",
  arrival: "",
  alternate: "",
};

/** Ask the API route for a briefing */
async function requestBriefing(request: BriefingRequest): Promise<BriefingResult> {
  const response = await fetch("/api/briefing", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      departure: request.departure,
      arrival: request.arrival,
      alternate: request.alternate?.trim() ? request.alternate : undefined,
    }),
  });

  if (!response.ok) {
    const error = await response.json().catch(() => ({}));
    throw new Error(error.error || "Failed to fetch briefing");
  }

  return response.json();
}

export function BriefingPlanner() {
  const [formState, setFormState] = React.useState<BriefingRequest>(emptyRequest);
  const [submitted, setSubmitted] = React.useState<BriefingRequest | null>(null);
  const [result, setResult] = React.useState<BriefingResult | null>(null);
  const [error, setError] = React.useState<string | null>(null);
  const [isLoading, setIsLoading] = React.useState(false);
  const [refreshMs, setRefreshMs] = React.useState<number | null>(null);

  // Only the newest request may update the page
  const latestRequestId = React.useRef(0);
  const isPending = React.useRef(false);

  const loadBriefing = React.useCallback(async (request: BriefingRequest) => {
    const requestId = ++latestRequestId.current;
    isPending.current = true;
    setIsLoading(true);
    setError(null);
    try {
      const briefing = await requestBriefing(request);
      if (requestId === latestRequestId.current) {
        setResult(briefing);
      }
    } catch (err) {
      console.error("Briefing request failed:", err);
      if (requestId === latestRequestId.current) {
        setError(err instanceof Error ? err.message : "Failed to fetch briefing");
      }
    } finally {
      if (requestId === latestRequestId.current) {
        isPending.current = false;
        setIsLoading(false);
      }
    }
  }, []);

  const handleSubmit = (request: BriefingRequest) => {
    setSubmitted(request);
    void loadBriefing(request);
  };

  // Re-run the last submitted briefing while auto-refresh is on
  React.useEffect(() => {
    if (refreshMs === null || submitted === null) {
      return;
    }
    const interval = setInterval(() => {
      if (!isPending.current) {
        void loadBriefing(submitted);
      }
    }, refreshMs);
    return () => clearInterval(interval);
  }, [refreshMs, submitted, loadBriefing]);

  return (
    <div className="space-y-6">
      {error && <FormError message={error} onDismiss={() => setError(null)} />}

      <BriefingForm
        value={formState}
        onChange={setFormState}
        onSubmit={handleSubmit}
        isLoading={isLoading}
      />

      {result && (
        <div className="space-y-6">
          <WeatherPanel weather={result.weather} retrievedAt={result.retrievedAt} />
          <AirportInfoPanel kind="datis" result={result} />
          <AirportInfoPanel kind="status" result={result} />
        </div>
      )}

      <AutoRefreshControl onChange={setRefreshMs} />
    </div>
  );
}
