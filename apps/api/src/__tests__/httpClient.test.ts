import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  createHttpClient,
  isTimeoutError,
  isTransportError,
  UpstreamHttpError,
} from "../server/httpClient.js";

const URL_UNDER_TEST = "https://upstream.test/api/v2/pokemon/pikachu";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("createHttpClient", () => {
  const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("returns the parsed body and forwards the request id", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ id: 25, name: "pikachu" }));
    const http = createHttpClient({ requestId: "req-1" });

    const body = await http.getJson(URL_UNDER_TEST);

    expect(body).toEqual({ id: 25, name: "pikachu" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        method: "GET",
        headers: { Accept: "application/json", "X-Request-ID": "req-1" },
      }),
    );
  });

  it("throws UpstreamHttpError with the status and never retries it", async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ detail: "Not found" }, 404));
    const http = createHttpClient({ requestId: "req-2" });

    const failure = http.getJson(URL_UNDER_TEST, { retries: 2 });

    await expect(failure).rejects.toBeInstanceOf(UpstreamHttpError);
    await expect(failure).rejects.toMatchObject({ status: 404, url: URL_UNDER_TEST });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("aborts a request that exceeds the timeout", async () => {
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const error = new Error("This operation was aborted");
            error.name = "AbortError";
            reject(error);
          });
        }),
    );
    const http = createHttpClient({ requestId: "req-3" });

    const failure = http.getJson(URL_UNDER_TEST, { timeoutMs: 20 });

    await expect(failure).rejects.toMatchObject({ name: "AbortError" });
  });

  it("retries network failures up to the retry budget", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    const http = createHttpClient({ requestId: "req-4" });

    const body = await http.getJson(URL_UNDER_TEST, { retries: 1 });

    expect(body).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last network failure once retries run out", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const http = createHttpClient({ requestId: "req-5" });

    await expect(http.getJson(URL_UNDER_TEST, { retries: 1 })).rejects.toThrow(
      "fetch failed",
    );
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("does not retry by default", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));
    const http = createHttpClient({ requestId: "req-6" });

    await expect(http.getJson(URL_UNDER_TEST)).rejects.toBeInstanceOf(TypeError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("uses the client defaults when a call passes no options", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse([]));
    const http = createHttpClient({ requestId: "req-7", defaults: { retries: 1 } });

    await expect(http.getJson(URL_UNDER_TEST)).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe("error classification", () => {
  it("treats aborts as timeouts and transport failures", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";

    expect(isTimeoutError(abort)).toBe(true);
    expect(isTransportError(abort)).toBe(true);
  });

  it("treats TypeError as a transport failure but not a timeout", () => {
    expect(isTransportError(new TypeError("fetch failed"))).toBe(true);
    expect(isTimeoutError(new TypeError("fetch failed"))).toBe(false);
  });

  it("does not treat HTTP or parse errors as transport failures", () => {
    expect(isTransportError(new UpstreamHttpError("u", 500, "Server Error"))).toBe(false);
    expect(isTransportError(new SyntaxError("Unexpected token"))).toBe(false);
    expect(isTransportError("boom")).toBe(false);
  });
});
