"use client";

import * as React from "react";
import { Clock } from "lucide-react";
import { formatUtcTimestamp } from "@/lib/time-format";

const TICK_MS = 1000;

interface UtcClockProps {
  /** Clock source (for testing) */
  now?: () => Date;
}

export function UtcClock({ now = () => new Date() }: UtcClockProps) {
  const nowRef = React.useRef(now);
  // Rendered after mount only, so server and client markup agree
  const [time, setTime] = React.useState<string | null>(null);

  React.useEffect(() => {
    const tick = () => setTime(formatUtcTimestamp(nowRef.current()));
    tick();
    const interval = setInterval(tick, TICK_MS);
    return () => clearInterval(interval);
  }, []);

  return (
    <div className="flex items-center gap-2 text-sm text-slate-500">
      <Clock className="h-4 w-4" />
      <span>Current UTC:</span>
      <span className="font-semibold tabular-nums text-sky-700" data-testid="utc-time">
        {time ?? "--"}
      </span>
    </div>
  );
}
