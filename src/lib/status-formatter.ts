/**
 * Plain-text rendering of an FAA airport status record.
 */

import type { AirportStatus, DelayReport, StatusWeather } from "@/types/briefing";

const HEAVY_RULE = "=".repeat(50);
const LIGHT_RULE = "-".repeat(30);
const NOT_AVAILABLE = "N/A";

function orNA(value: string | null): string {
  return value ?? NOT_AVAILABLE;
}

function formatDelay(delay: DelayReport): string[] {
  const lines = [
    "",
    `▸ ${delay.type.toUpperCase()} DELAY`,
    `  • Reason: ${delay.reason}`,
    `  • Minimum Delay: ${orNA(delay.minDelay)}`,
    `  • Maximum Delay: ${orNA(delay.maxDelay)}`,
  ];

  if (delay.avgDelay) {
    lines.push(`  • Average Delay: ${delay.avgDelay}`);
  }
  if (delay.trend) {
    lines.push(`  • Trend: ${delay.trend}`);
  }
  return lines;
}

function formatWeather(weather: StatusWeather): string[] {
  const lines = [
    "",
    "WEATHER CONDITIONS:",
    `  • Temperature: ${orNA(weather.temperature)}`,
    `  • Visibility: ${orNA(weather.visibility)} miles`,
    `  • Wind: ${orNA(weather.wind)}`,
  ];

  if (weather.updated) {
    lines.push(LIGHT_RULE, `Last Updated: ${weather.updated}`, LIGHT_RULE);
  }
  return lines;
}

export function formatAirportStatus(status: AirportStatus): string {
  const lines = [
    HEAVY_RULE,
    `Airport: ${status.icao} - ${status.name}`,
    `Location: ${orNA(status.city)}, ${orNA(status.state)}`,
    HEAVY_RULE,
    "",
    "STATUS INFORMATION",
  ];

  if (status.delay) {
    lines.push(`Number of Delays: ${status.delayCount}`, "", "Current Delays:");
    for (const delay of status.delays) {
      lines.push(...formatDelay(delay));
    }
  } else {
    lines.push("✓ No delays reported");
  }

  if (status.weather) {
    lines.push(...formatWeather(status.weather));
  }

  return lines.join("\n");
}
