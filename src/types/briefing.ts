/**
 * Briefing types - shared by the API route and the briefing page
 */

/**
 * Region an ICAO code belongs to, decided by its prefix
 */
export type SpecialRegion = "CONTINENTAL_US" | "HAWAII" | "PUERTO_RICO" | "OTHER";

/**
 * Flight category derived from ceiling and visibility
 */
export type FlightCategory = "VFR" | "MVFR" | "IFR" | "LIFR" | "UNKNOWN";

/**
 * Display colour for a flight category
 */
export type CategoryColor = "green" | "blue" | "red" | "magenta" | "black";

/**
 * One raw METAR or TAF line with its classification
 */
export interface WeatherLine {
  /** Line as returned by the weather service */
  raw: string;
  /** Airport token owning the line (null before the first station header) */
  airport: string | null;
  /** Lowest BKN/OVC/VV layer in feet */
  ceilingFt: number | null;
  /** Visibility in statute miles (6.1 stands for "more than 6") */
  visibilitySm: number | null;
  category: FlightCategory;
  color: CategoryColor;
}

/**
 * Consecutive weather lines belonging to one airport
 */
export interface WeatherGroup {
  airport: string | null;
  lines: WeatherLine[];
}

export type BriefingRole = "departure" | "arrival" | "alternate";

/**
 * Airport codes as entered by the user
 */
export interface BriefingRequest {
  departure: string;
  arrival: string;
  alternate?: string;
}

/**
 * Either the fetched value or a display-ready error message.
 * Each upstream retrieval produces one of these independently.
 */
export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export interface DelayReport {
  /** Delay program type, e.g. "Ground Delay" */
  type: string;
  reason: string;
  minDelay: string | null;
  maxDelay: string | null;
  avgDelay: string | null;
  trend: string | null;
}

export interface StatusWeather {
  temperature: string | null;
  visibility: string | null;
  wind: string | null;
  /** "Last Updated on ..." text from the FAA feed */
  updated: string | null;
}

/**
 * FAA airport status record
 */
export interface AirportStatus {
  icao: string;
  name: string;
  city: string | null;
  state: string | null;
  delay: boolean;
  delayCount: number;
  delays: DelayReport[];
  weather: StatusWeather | null;
}

export interface AirportStatusReport {
  record: AirportStatus;
  /** Plain-text rendering of the record */
  text: string;
}

/**
 * Everything fetched for one airport of the request
 */
export interface AirportBriefing {
  role: BriefingRole;
  /** Code as entered (trimmed, uppercased) */
  input: string;
  icao: string;
  iata: string;
  datis: FieldResult<string>;
  status: FieldResult<AirportStatusReport>;
}

export interface BriefingResult {
  weather: FieldResult<WeatherGroup[]>;
  airports: {
    departure: AirportBriefing;
    arrival: AirportBriefing;
    alternate?: AirportBriefing;
  };
  /** ISO-8601 UTC time the briefing was assembled */
  retrievedAt: string;
}
