/**
 * Airport code normalization between the forms each upstream API expects.
 *
 * - aviationweather.gov and the DATIS relay take ICAO codes (KJFK, PHNL)
 * - the FAA status service takes IATA codes (JFK, HNL)
 *
 * Hawaii and Puerto Rico don't follow the "K + IATA" rule, so they go
 * through a static table. Everything here is pure.
 */

import type { SpecialRegion } from "@/types/briefing";
import specialRegionAirports from "@/data/special-region-airports.json";
import { InvalidCodeError } from "./briefing-errors";

const CODE_PATTERN = /^[A-Z0-9]{3,4}$/;

const HAWAII_ICAO_TO_IATA: Readonly<Record<string, string>> =
  specialRegionAirports.hawaii;
const PUERTO_RICO_ICAO_TO_IATA: Readonly<Record<string, string>> =
  specialRegionAirports.puertoRico;

const SPECIAL_ICAO_TO_IATA = new Map<string, string>([
  ...Object.entries(HAWAII_ICAO_TO_IATA),
  ...Object.entries(PUERTO_RICO_ICAO_TO_IATA),
]);

const SPECIAL_IATA_TO_ICAO = new Map<string, string>(
  [...SPECIAL_ICAO_TO_IATA.entries()].map(([icao, iata]) => [iata, icao])
);

/**
 * IATA codes that map to a Hawaii or Puerto Rico ICAO code
 */
export const SPECIAL_REGION_IATA_CODES: readonly string[] = [
  ...SPECIAL_IATA_TO_ICAO.keys(),
];

/**
 * Trim, uppercase and validate user input.
 *
 * @throws InvalidCodeError for empty input or anything that isn't
 *   3-4 letters/digits
 */
export function normalizeCode(input: string): string {
  const code = input.trim().toUpperCase();

  if (!code) {
    throw new InvalidCodeError(code, "Airport code is required");
  }
  if (!CODE_PATTERN.test(code)) {
    throw new InvalidCodeError(
      code,
      `Invalid airport code "${code}" (expected 3 or 4 letters)`
    );
  }

  return code;
}

/**
 * Convert user input to the ICAO form.
 *
 * 4-letter codes and PH/TJ-prefixed codes are taken as ICAO already.
 * Other 3-letter codes get a "K" prefix unless they are a known
 * Hawaii/Puerto Rico IATA code (HNL -> PHNL).
 */
export function toICAO(input: string): string {
  const code = normalizeCode(input);

  if (code.length === 4 || code.startsWith("PH") || code.startsWith("TJ")) {
    return code;
  }

  return SPECIAL_IATA_TO_ICAO.get(code) ?? `K${code}`;
}

/**
 * Convert user input to the IATA form used by the FAA status service.
 *
 * Non-US codes fall back to dropping the first letter, which is only a
 * guess (EGLL -> GLL, not LHR).
 */
export function toIATA(input: string): string {
  const code = normalizeCode(input);

  if (code.length === 3) {
    return code;
  }

  const special = SPECIAL_ICAO_TO_IATA.get(code);
  if (special) {
    return special;
  }

  switch (regionOf(code)) {
    case "HAWAII":
    case "PUERTO_RICO":
      return code.slice(2);
    default:
      return code.slice(1);
  }
}

/**
 * Region of an ICAO code, by prefix
 */
export function regionOf(icao: string): SpecialRegion {
  const code = icao.trim().toUpperCase();

  if (code.startsWith("PH")) return "HAWAII";
  if (code.startsWith("TJ")) return "PUERTO_RICO";
  if (code.length === 4 && code.startsWith("K")) return "CONTINENTAL_US";
  return "OTHER";
}
