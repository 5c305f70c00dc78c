/**
 * Flight category classification for raw METAR/TAF text.
 *
 * This is a text-matching approximation, not a decoder: each line is
 * classified on its own from the tokens it contains.
 */

import type {
  CategoryColor,
  FlightCategory,
  WeatherGroup,
  WeatherLine,
} from "@/types/briefing";

// Any of these means the line is treated as VFR without further parsing
const VFR_TOKENS = ["SKC", "CLR", "SCT", "FEW", "P6SM"];

// "More than 6 statute miles"
const P6SM_VISIBILITY = 6.1;

const VISIBILITY_PATTERN = /(\d{1,2})SM/;
const CEILING_PATTERN = /(OVC|BKN|VV)(\d{3})/g;

// Report-type prefixes that can precede the station on a header line
const HEADER_PREFIX_PATTERN = /^(?:(?:TAF|METAR|SPECI)\s+)?(?:(?:AMD|COR)\s+)?/;
const STATION_PATTERN = /^([A-Z]{3,4})\b/;
const NON_STATION_WORDS = new Set(["TAF", "AMD", "COR", "NIL", "RMK", "AUTO"]);

const CATEGORY_COLORS: Record<FlightCategory, CategoryColor> = {
  VFR: "green",
  MVFR: "blue",
  IFR: "red",
  LIFR: "magenta",
  UNKNOWN: "black",
};

/**
 * Visibility in statute miles, or null when the line has none
 */
export function parseVisibility(line: string): number | null {
  if (line.includes("P6SM")) {
    return P6SM_VISIBILITY;
  }

  const match = line.match(VISIBILITY_PATTERN);
  return match ? parseInt(match[1], 10) : null;
}

/**
 * Lowest BKN/OVC/VV layer in feet, or null when the line has none
 */
export function parseCeiling(line: string): number | null {
  const heights = [...line.matchAll(CEILING_PATTERN)].map(
    (match) => parseInt(match[2], 10) * 100
  );

  return heights.length > 0 ? Math.min(...heights) : null;
}

/**
 * Classify a single METAR/TAF line.
 *
 * The range checks overlap and are evaluated top to bottom: a low ceiling
 * wins over good visibility and vice versa.
 */
export function classify(line: string): FlightCategory {
  if (VFR_TOKENS.some((token) => line.includes(token))) {
    return "VFR";
  }

  const visibility = parseVisibility(line);
  const ceiling = parseCeiling(line);

  if (ceiling === null || visibility === null) {
    return "UNKNOWN";
  }

  if (ceiling < 500 || visibility < 1) {
    return "LIFR";
  }
  if ((ceiling >= 500 && ceiling < 1000) || (visibility >= 1 && visibility < 3)) {
    return "IFR";
  }
  if (
    (ceiling >= 1000 && ceiling <= 3000) ||
    (visibility >= 3 && visibility <= 5)
  ) {
    return "MVFR";
  }
  if (ceiling > 3000 && visibility > 5) {
    return "VFR";
  }
  return "UNKNOWN";
}

export function colorFor(category: FlightCategory): CategoryColor {
  return CATEGORY_COLORS[category];
}

/**
 * Station token at the start of a header line ("KJFK 191251Z ...",
 * "TAF AMD PHNL ..."). Indented continuation lines have none.
 */
export function extractStation(line: string): string | null {
  if (/^\s/.test(line)) {
    return null;
  }

  const rest = line.replace(HEADER_PREFIX_PATTERN, "");
  const match = rest.match(STATION_PATTERN);
  if (!match || NON_STATION_WORDS.has(match[1])) {
    return null;
  }
  return match[1];
}

/**
 * Parse one line. Lines without a station token inherit the airport of
 * the line before them.
 */
export function parseWeatherLine(
  line: string,
  previousAirport: string | null = null
): WeatherLine {
  const category = classify(line);

  return {
    raw: line,
    airport: extractStation(line) ?? previousAirport,
    ceilingFt: parseCeiling(line),
    visibilitySm: parseVisibility(line),
    category,
    color: colorFor(category),
  };
}

/**
 * Split raw weather text into per-airport groups. Blank lines are dropped
 * and a new group starts whenever the station token changes.
 */
export function groupWeatherLines(text: string): WeatherGroup[] {
  const groups: WeatherGroup[] = [];
  let current: WeatherGroup | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    if (!rawLine.trim()) {
      continue;
    }

    const line = parseWeatherLine(rawLine.trimEnd(), current?.airport ?? null);

    if (!current || line.airport !== current.airport) {
      current = { airport: line.airport, lines: [] };
      groups.push(current);
    }
    current.lines.push(line);
  }

  return groups;
}
