"use client";

import * as React from "react";
import { RefreshCw } from "lucide-react";
import { cn } from "@/lib/utils";
import { parseRefreshInterval } from "@/lib/refresh-interval";

interface AutoRefreshControlProps {
  /** Called with the interval in ms when started, null when stopped */
  onChange: (intervalMs: number | null) => void;
}

export function AutoRefreshControl({ onChange }: AutoRefreshControlProps) {
  const [seconds, setSeconds] = React.useState("");
  const [isActive, setIsActive] = React.useState(false);
  const [error, setError] = React.useState<string | null>(null);

  const handleToggle = () => {
    if (isActive) {
      setIsActive(false);
      onChange(null);
      return;
    }

    const parsed = parseRefreshInterval(seconds);
    if (!parsed.ok) {
      setSeconds("");
      setError(parsed.error);
      return;
    }

    setError(null);
    setIsActive(true);
    onChange(parsed.ms);
  };

  return (
    <div className="space-y-1">
      <div className="flex items-center gap-3 text-sm">
        <label htmlFor="refresh-interval" className="text-slate-600">
          Auto-refresh (sec):
        </label>
        <input
          id="refresh-interval"
          value={seconds}
          placeholder="e.g., 60"
          inputMode="numeric"
          disabled={isActive}
          onChange={(e) => setSeconds(e.target.value)}
          className="h-9 w-20 rounded-md border border-slate-200 bg-white px-2 disabled:bg-slate-100"
        />
        <button
          type="button"
          aria-pressed={isActive}
          onClick={handleToggle}
          className={cn(
            "flex h-9 items-center gap-2 rounded-md border px-3 font-medium transition-colors",
            isActive
              ? "border-sky-600 bg-sky-600 text-white hover:bg-sky-700"
              : "border-slate-200 bg-white text-slate-700 hover:bg-slate-50"
          )}
        >
          <RefreshCw className={cn("h-4 w-4", isActive && "animate-spin [animation-duration:3s]")} />
          {isActive ? "Stop Auto-Refresh" : "Start Auto-Refresh"}
        </button>
      </div>
      {error && <p className="text-sm text-red-600">{error}</p>}
    </div>
  );
}
