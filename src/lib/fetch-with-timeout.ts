/**
 * GET with a bounded timeout. Never throws: failures come back as
 * `{ ok: false }` with status 0 when no response arrived.
 */

export interface FetchOptions {
  /** Query parameters appended to the URL */
  query?: Record<string, string>;
  timeoutMs?: number;
  accept?: string;
}

export type FetchResult =
  | { ok: true; status: number; body: string }
  | { ok: false; status: number; error: string };

/**
 * Signature the upstream clients depend on, so tests can pass a fake.
 */
export type HttpGet = (url: string, options?: FetchOptions) => Promise<FetchResult>;

export const DEFAULT_TIMEOUT_MS = 10000;

export function buildUrl(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }
  const params = new URLSearchParams(query);
  return `${url}${url.includes("?") ? "&" : "?"}${params.toString()}`;
}

export const fetchWithTimeout: HttpGet = async (url, options = {}) => {
  const { query, timeoutMs = DEFAULT_TIMEOUT_MS, accept = "*/*" } = options;
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(buildUrl(url, query), {
      signal: ctrl.signal,
      headers: {
        Accept: accept,
        "User-Agent": "wx-brief",
      },
      cache: "no-store",
    });

    const body = await res.text();
    if (!res.ok) {
      return { ok: false, status: res.status, error: body.slice(0, 2000) };
    }
    return { ok: true, status: res.status, body };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      return { ok: false, status: 0, error: "Timeout" };
    }
    const message = error instanceof Error ? error.message : "Fetch failed";
    return { ok: false, status: 0, error: message };
  } finally {
    clearTimeout(t);
  }
};
