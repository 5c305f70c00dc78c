import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildUrl, fetchWithTimeout } from "../fetch-with-timeout";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

describe("buildUrl", () => {
  it("returns the URL untouched without a query", () => {
    expect(buildUrl("https://example.test/api")).toBe("https://example.test/api");
    expect(buildUrl("https://example.test/api", {})).toBe("https://example.test/api");
  });

  it("encodes query parameters", () => {
    expect(buildUrl("https://example.test/taf", { ids: "KJFK,KLAX", format: "raw" })).toBe(
      "https://example.test/taf?ids=KJFK%2CKLAX&format=raw"
    );
  });

  it("appends to an existing query string", () => {
    expect(buildUrl("https://example.test/taf?a=1", { b: "2" })).toBe(
      "https://example.test/taf?a=1&b=2"
    );
  });
});

describe("fetchWithTimeout", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the body of a successful response", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      text: async () => "KJFK 191251Z",
    });

    const result = await fetchWithTimeout("https://example.test/taf", {
      query: { ids: "KJFK" },
      accept: "text/plain",
    });

    expect(result).toEqual({ ok: true, status: 200, body: "KJFK 191251Z" });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://example.test/taf?ids=KJFK");
    expect(init.headers).toEqual({ Accept: "text/plain", "User-Agent": "wx-brief" });
    expect(init.cache).toBe("no-store");
  });

  it("reports non-2xx responses with their status", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 404,
      text: async () => "Not Found",
    });

    const result = await fetchWithTimeout("https://example.test/datis/KXYZ");

    expect(result).toEqual({ ok: false, status: 404, error: "Not Found" });
  });

  it("truncates long error bodies", async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 500,
      text: async () => "x".repeat(5000),
    });

    const result = await fetchWithTimeout("https://example.test");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toHaveLength(2000);
    }
  });

  it("reports an abort as a timeout", async () => {
    mockFetch.mockRejectedValueOnce(abortError());

    const result = await fetchWithTimeout("https://example.test");

    expect(result).toEqual({ ok: false, status: 0, error: "Timeout" });
  });

  it("aborts the request once the timeout elapses", async () => {
    vi.useFakeTimers();
    mockFetch.mockImplementationOnce(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(abortError()));
        })
    );

    const pending = fetchWithTimeout("https://example.test", { timeoutMs: 1000 });
    await vi.advanceTimersByTimeAsync(1000);

    expect(await pending).toEqual({ ok: false, status: 0, error: "Timeout" });
  });

  it("reports network failures with their message", async () => {
    mockFetch.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND example.test"));

    const result = await fetchWithTimeout("https://example.test");

    expect(result).toEqual({
      ok: false,
      status: 0,
      error: "getaddrinfo ENOTFOUND example.test",
    });
  });

  it("falls back to a generic message for non-Error rejections", async () => {
    mockFetch.mockRejectedValueOnce("boom");

    const result = await fetchWithTimeout("https://example.test");

    expect(result).toEqual({ ok: false, status: 0, error: "Fetch failed" });
  });
});
