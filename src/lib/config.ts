/**
 * Runtime configuration read from environment variables.
 *
 * All values have defaults, so the app runs with no .env at all. Set the
 * URL variables to point at a proxy or a local stub.
 */

import { z } from "zod";

const urlSchema = z
  .string()
  .trim()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

const configSchema = z.object({
  WX_WEATHER_URL: urlSchema.default("https://aviationweather.gov/api/data/taf"),
  WX_DATIS_URL: urlSchema.default("https://datis.clowd.io/api"),
  WX_STATUS_URL: urlSchema.default(
    "https://external-api.faa.gov/asws/api/airport/status"
  ),
  WX_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).max(60000).default(10000),
  WX_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).max(3600).default(60),
});

export interface WxConfig {
  weatherUrl: string;
  datisUrl: string;
  statusUrl: string;
  requestTimeoutMs: number;
  /** 0 disables caching */
  cacheTtlSeconds: number;
}

let cachedConfig: WxConfig | null = null;

/**
 * Parse configuration from an environment object.
 *
 * Empty strings count as unset.
 * @throws Error naming the first invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): WxConfig {
  const present = Object.fromEntries(
    Object.keys(configSchema.shape)
      .map((key): [string, string | undefined] => [key, env[key]?.trim()])
      .filter(([, value]) => value)
  );

  const parseResult = configSchema.safeParse(present);
  if (!parseResult.success) {
    const firstError = parseResult.error.issues[0];
    throw new Error(
      `Invalid configuration: ${firstError.path.join(".")}: ${firstError.message}`
    );
  }

  const values = parseResult.data;
  return {
    weatherUrl: values.WX_WEATHER_URL,
    datisUrl: values.WX_DATIS_URL,
    statusUrl: values.WX_STATUS_URL,
    requestTimeoutMs: values.WX_REQUEST_TIMEOUT_MS,
    cacheTtlSeconds: values.WX_CACHE_TTL_SECONDS,
  };
}

/**
 * Configuration for this process (parsed once)
 */
export function getConfig(): WxConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Drop the parsed configuration (for testing).
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
