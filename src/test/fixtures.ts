/**
 * Briefing fixtures shared by component tests
 */

import type { AirportBriefing, BriefingResult, BriefingRole } from "@/types/briefing";

export function makeAirportBriefing(
  role: BriefingRole,
  input: string,
  overrides: Partial<AirportBriefing> = {}
): AirportBriefing {
  const icao = input.length === 3 ? `K${input}` : input;
  return {
    role,
    input,
    icao,
    iata: input,
    datis: { ok: true, value: `${icao} ATIS INFO A` },
    status: {
      ok: true,
      value: {
        record: {
          icao,
          name: `${input} Airport`,
          city: null,
          state: null,
          delay: false,
          delayCount: 0,
          delays: [],
          weather: null,
        },
        text: `Airport: ${icao}\n✓ No delays reported`,
      },
    },
    ...overrides,
  };
}

export function makeBriefingResult(overrides: Partial<BriefingResult> = {}): BriefingResult {
  return {
    weather: {
      ok: true,
      value: [
        {
          airport: "KJFK",
          lines: [
            {
              raw: "KJFK 191251Z 31012KT 2SM BR OVC008 12/11 A2992",
              airport: "KJFK",
              ceilingFt: 800,
              visibilitySm: 2,
              category: "IFR",
              color: "red",
            },
          ],
        },
        {
          airport: "KLAX",
          lines: [
            {
              raw: "KLAX 191253Z 00000KT 10SM CLR 18/10 A2998",
              airport: "KLAX",
              ceilingFt: null,
              visibilitySm: 10,
              category: "VFR",
              color: "green",
            },
            {
              raw: "  FM191800 32012G20KT 3SM -RA OVC015",
              airport: "KLAX",
              ceilingFt: 1500,
              visibilitySm: 3,
              category: "MVFR",
              color: "blue",
            },
          ],
        },
      ],
    },
    airports: {
      departure: makeAirportBriefing("departure", "JFK"),
      arrival: makeAirportBriefing("arrival", "LAX"),
    },
    retrievedAt: "2025-03-09T12:00:00.000Z",
    ...overrides,
  };
}
