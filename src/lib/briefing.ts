/**
 * Briefing aggregator.
 *
 * Normalizes the requested airports, fires every upstream retrieval at
 * once and joins them. Each retrieval settles into its own FieldResult, so
 * one failing service never takes the others down with it.
 */

import type {
  AirportBriefing,
  AirportStatus,
  BriefingRequest,
  BriefingResult,
  BriefingRole,
  FieldResult,
} from "@/types/briefing";
import { toIATA, toICAO } from "./airport-codes";
import { getErrorMessage } from "./briefing-errors";
import { getConfig } from "./config";
import { groupWeatherLines } from "./flight-category";
import { formatAirportStatus } from "./status-formatter";
import { NoopCache, TtlCache, type Cache } from "./ttl-cache";
import { createWxSources, type WxSources } from "./wx-sources";

/**
 * One cache per data kind, keyed by normalized codes
 */
export interface BriefingCaches {
  weather: Cache<string>;
  datis: Cache<string>;
  status: Cache<AirportStatus>;
}

export interface BriefingDeps {
  sources: WxSources;
  caches: BriefingCaches;
  cacheTtlSeconds: number;
  now: () => Date;
}

interface ResolvedAirport {
  role: BriefingRole;
  input: string;
  icao: string;
  iata: string;
}

interface ResolvedAirports {
  departure: ResolvedAirport;
  arrival: ResolvedAirport;
  alternate?: ResolvedAirport;
}

export function createBriefingCaches(maxEntries = 128): BriefingCaches {
  return {
    weather: new TtlCache<string>({ maxEntries }),
    datis: new TtlCache<string>({ maxEntries }),
    status: new TtlCache<AirportStatus>({ maxEntries }),
  };
}

export function createNoopCaches(): BriefingCaches {
  return {
    weather: new NoopCache<string>(),
    datis: new NoopCache<string>(),
    status: new NoopCache<AirportStatus>(),
  };
}

/**
 * Fill in whatever the caller did not inject. Configuration is only read
 * when a member that depends on it is missing.
 */
function resolveDeps(overrides: Partial<BriefingDeps>): BriefingDeps {
  return {
    sources: overrides.sources ?? createWxSources(getConfig()),
    caches: overrides.caches ?? createNoopCaches(),
    cacheTtlSeconds: overrides.cacheTtlSeconds ?? getConfig().cacheTtlSeconds,
    now: overrides.now ?? (() => new Date()),
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Run a retrieval and capture its outcome instead of letting it reject.
 */
async function settle<T>(label: string, task: () => Promise<T>): Promise<FieldResult<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    console.error(`${label} failed:`, error);
    return { ok: false, error: getErrorMessage(error) };
  }
}

function mapResult<T, U>(result: FieldResult<T>, fn: (value: T) => U): FieldResult<U> {
  return result.ok ? { ok: true, value: fn(result.value) } : result;
}

function resolveAirport(role: BriefingRole, value: string): ResolvedAirport {
  const icao = toICAO(value);
  return {
    role,
    input: value.trim().toUpperCase(),
    icao,
    iata: toIATA(icao),
  };
}

/**
 * Normalize the codes of a request. A blank alternate counts as absent.
 *
 * @throws InvalidCodeError before any network call is made
 */
export function resolveAirports(request: BriefingRequest): ResolvedAirports {
  const departure = resolveAirport("departure", request.departure);
  const arrival = resolveAirport("arrival", request.arrival);

  if (!request.alternate?.trim()) {
    return { departure, arrival };
  }
  return {
    departure,
    arrival,
    alternate: resolveAirport("alternate", request.alternate),
  };
}

export async function buildBriefing(
  request: BriefingRequest,
  overrides: Partial<BriefingDeps> = {}
): Promise<BriefingResult> {
  const resolved = resolveAirports(request);
  const deps = resolveDeps(overrides);
  const { sources, caches, cacheTtlSeconds } = deps;

  const briefAirport = async (airport: ResolvedAirport): Promise<AirportBriefing> => {
    const [datis, status] = await Promise.all([
      settle(`DATIS fetch for ${airport.icao}`, () =>
        caches.datis.getOrCompute(airport.icao, cacheTtlSeconds, () =>
          sources.fetchDatis(airport.icao)
        )
      ),
      settle(`Airport status fetch for ${airport.iata}`, () =>
        caches.status.getOrCompute(airport.iata, cacheTtlSeconds, () =>
          sources.fetchAirportStatus(airport.iata)
        )
      ),
    ]);

    return {
      ...airport,
      datis,
      // The cached record stays private to the cache
      status: mapResult(status, (cached) => {
        const record = structuredClone(cached);
        return { record, text: formatAirportStatus(record) };
      }),
    };
  };

  const present = [resolved.departure, resolved.arrival, resolved.alternate];
  const weatherIds = [
    ...new Set(present.flatMap((airport) => (airport ? [airport.icao] : []))),
  ];
  const weatherKey = weatherIds.join(",");

  const [weather, departure, arrival, alternate] = await Promise.all([
    settle(`Weather fetch for ${weatherKey}`, () =>
      caches.weather.getOrCompute(weatherKey, cacheTtlSeconds, () =>
        sources.fetchWeather(weatherIds)
      )
    ).then((result) => mapResult(result, groupWeatherLines)),
    briefAirport(resolved.departure),
    briefAirport(resolved.arrival),
    resolved.alternate ? briefAirport(resolved.alternate) : undefined,
  ]);

  return deepFreeze<BriefingResult>({
    weather,
    airports: alternate ? { departure, arrival, alternate } : { departure, arrival },
    retrievedAt: deps.now().toISOString(),
  });
}
