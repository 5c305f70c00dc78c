/**
 * Clients for the three upstream services a briefing draws on:
 *
 * - aviationweather.gov: raw METAR + TAF text for several stations at once
 * - DATIS relay: digital ATIS text per ICAO code
 * - FAA ASWS: airport delay status per IATA code
 *
 * Each function throws UpstreamUnavailableError or MalformedResponseError;
 * the briefing aggregator turns those into display strings.
 */

import { z } from "zod";
import type { AirportStatus } from "@/types/briefing";
import { MalformedResponseError, UpstreamUnavailableError } from "./briefing-errors";
import type { WxConfig } from "./config";
import { fetchWithTimeout, type FetchResult, type HttpGet } from "./fetch-with-timeout";

export interface WxSources {
  /** Raw METAR/TAF text for the given ICAO codes */
  fetchWeather(icaos: string[]): Promise<string>;
  /** DATIS text for one ICAO code */
  fetchDatis(icao: string): Promise<string>;
  /** FAA status for one IATA code */
  fetchAirportStatus(iata: string): Promise<AirportStatus>;
}

// Scalars in the FAA feed arrive as strings or numbers depending on the field
const textSchema = z.union([z.string(), z.number()]).transform(String);

const datisSchema = z
  .array(
    z.object({
      airport: z.string().optional(),
      type: z.string().optional(),
      datis: z.string().min(1),
    })
  )
  .min(1);

const delaySchema = z.object({
  Type: z.string().optional(),
  Reason: textSchema.optional(),
  MinDelay: textSchema.optional(),
  MaxDelay: textSchema.optional(),
  AvgDelay: textSchema.optional(),
  Trend: textSchema.optional(),
});

const statusSchema = z.object({
  ICAO: z.string(),
  Name: z.string(),
  City: z.string().optional(),
  State: z.string().optional(),
  Delay: z.union([z.boolean(), z.enum(["true", "false"])]).optional(),
  DelayCount: z.coerce.number().optional(),
  Status: z.array(delaySchema).optional(),
  Weather: z
    .object({
      Temp: z.array(textSchema).optional(),
      Visibility: z.array(textSchema).optional(),
      Wind: z.array(textSchema).optional(),
      Meta: z.array(z.object({ Updated: z.string().optional() })).optional(),
    })
    .optional(),
});

type StatusPayload = z.infer<typeof statusSchema>;

function upstreamError(
  result: Extract<FetchResult, { ok: false }>,
  describe: (status: number) => string
): UpstreamUnavailableError {
  if (result.status === 0) {
    const reason = result.error === "Timeout" ? "Request timed out" : result.error;
    return new UpstreamUnavailableError(reason, 0);
  }
  return new UpstreamUnavailableError(describe(result.status), result.status);
}

function parseJson(body: string, service: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new MalformedResponseError(`${service} response was not valid JSON`);
  }
}

/**
 * Join arrival/departure broadcasts when an airport publishes them separately
 */
function combineDatis(entries: z.infer<typeof datisSchema>): string {
  if (entries.length === 1) {
    return entries[0].datis;
  }
  return entries
    .map((entry) =>
      entry.type ? `${entry.type.toUpperCase()}: ${entry.datis}` : entry.datis
    )
    .join("\n\n");
}

function toAirportStatus(payload: StatusPayload): AirportStatus {
  const weather = payload.Weather;
  const delay = payload.Delay === true || payload.Delay === "true";

  return {
    icao: payload.ICAO,
    name: payload.Name,
    city: payload.City ?? null,
    state: payload.State ?? null,
    delay,
    delayCount: payload.DelayCount ?? 0,
    delays: delay
      ? (payload.Status ?? []).map((item) => ({
          type: item.Type ?? "UNKNOWN",
          reason: item.Reason ?? "N/A",
          minDelay: item.MinDelay ?? null,
          maxDelay: item.MaxDelay ?? null,
          avgDelay: item.AvgDelay ?? null,
          trend: item.Trend ?? null,
        }))
      : [],
    weather: weather
      ? {
          temperature: weather.Temp?.[0] ?? null,
          visibility: weather.Visibility?.[0] ?? null,
          wind: weather.Wind?.[0] ?? null,
          updated: weather.Meta?.[0]?.Updated ?? null,
        }
      : null,
  };
}

export function createWxSources(
  config: WxConfig,
  get: HttpGet = fetchWithTimeout
): WxSources {
  const timeoutMs = config.requestTimeoutMs;

  return {
    async fetchWeather(icaos) {
      const ids = icaos.join(",");
      const result = await get(config.weatherUrl, {
        query: { ids, format: "raw", metar: "true", time: "valid" },
        timeoutMs,
        accept: "text/plain",
      });

      if (!result.ok) {
        throw upstreamError(
          result,
          (status) => `Weather service returned status ${status}`
        );
      }
      if (!result.body.trim()) {
        throw new MalformedResponseError(`No METAR/TAF returned for ${ids}`);
      }
      return result.body;
    },

    async fetchDatis(icao) {
      const result = await get(`${config.datisUrl}/${encodeURIComponent(icao)}`, {
        timeoutMs,
        accept: "application/json",
      });

      if (!result.ok) {
        throw upstreamError(
          result,
          (status) => `No DATIS available (status ${status})`
        );
      }

      const parsed = datisSchema.safeParse(parseJson(result.body, "DATIS"));
      if (!parsed.success) {
        throw new MalformedResponseError(`DATIS not available for ${icao}`);
      }
      return combineDatis(parsed.data);
    },

    async fetchAirportStatus(iata) {
      const result = await get(`${config.statusUrl}/${encodeURIComponent(iata)}`, {
        timeoutMs,
        accept: "application/json",
      });

      if (!result.ok) {
        throw upstreamError(
          result,
          (status) =>
            `Could not retrieve status for airport code ${iata} (status ${status})`
        );
      }

      const parsed = statusSchema.safeParse(parseJson(result.body, "Airport status"));
      if (!parsed.success) {
        const firstError = parsed.error.issues[0];
        const fieldPath = firstError.path.join(".");
        throw new MalformedResponseError(
          `Invalid airport status data: ${fieldPath ? `${fieldPath}: ` : ""}${firstError.message}`
        );
      }
      return toAirportStatus(parsed.data);
    },
  };
}
