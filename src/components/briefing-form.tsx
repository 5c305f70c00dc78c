"use client";

import * as React from "react";
import { CloudSun, Loader2 } from "lucide-react";
import type { BriefingRequest } from "@/types/briefing";

interface BriefingFormProps {
  value: BriefingRequest;
  onChange: (value: BriefingRequest) => void;
  onSubmit: (value: BriefingRequest) => void;
  isLoading?: boolean;
}

const FIELDS = [
  { key: "departure", label: "Departure", placeholder: "Departure (JFK)" },
  { key: "arrival", label: "Arrival", placeholder: "Arrival (LAX)" },
  { key: "alternate", label: "Alternate", placeholder: "Alternate (Optional)" },
] as const;

export function BriefingForm({
  value,
  onChange,
  onSubmit,
  isLoading = false,
}: BriefingFormProps) {
  const canSubmit =
    value.departure.trim() !== "" && value.arrival.trim() !== "" && !isLoading;

  const handleSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    if (canSubmit) {
      onSubmit(value);
    }
  };

  return (
    <form onSubmit={handleSubmit} className="space-y-4">
      <div className="grid gap-4 sm:grid-cols-3">
        {FIELDS.map((field) => (
          <label key={field.key} className="space-y-1 text-sm font-medium text-slate-700">
            <span>{field.label}</span>
            <input
              name={field.key}
              value={value[field.key] ?? ""}
              placeholder={field.placeholder}
              maxLength={4}
              autoComplete="off"
              onChange={(e) =>
                onChange({ ...value, [field.key]: e.target.value.toUpperCase() })
              }
              className="flex h-10 w-full rounded-md border border-slate-200 bg-white px-3 font-mono uppercase placeholder:font-sans placeholder:normal-case placeholder:text-slate-400 focus:outline-none focus:ring-2 focus:ring-sky-400"
            />
          </label>
        ))}
      </div>

      <button
        type="submit"
        disabled={!canSubmit}
        className="flex h-11 w-full items-center justify-center gap-2 rounded-md bg-sky-600 font-semibold text-white transition-colors hover:bg-sky-700 disabled:cursor-not-allowed disabled:bg-slate-300"
      >
        {isLoading ? (
          <Loader2 className="h-4 w-4 animate-spin" />
        ) : (
          <CloudSun className="h-4 w-4" />
        )}
        Get Weather Briefing
      </button>
    </form>
  );
}
