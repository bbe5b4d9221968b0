/**
 * @fileoverview Server-side HTTP client for upstream calls, with request tracing
 *
 * Every client is bound to the id of the incoming request that created it.
 * The id is sent downstream as `X-Request-ID` and prefixes every log line,
 * so "request abc123 timed out on /pokemon/pikachu" can be traced end to end.
 *
 * FAILURE MODES:
 * - Non-OK status: `UpstreamHttpError` carrying the status. Never retried.
 * - Timeout: the fetch is aborted and rejects with an `AbortError`.
 * - Network failure: `fetch` rejects with a `TypeError`.
 *
 * Timeouts and network failures are retried `retries` times with a linear
 * backoff; the upstream config sets `retries` to 0 by default.
 */

import { sleep } from "@assessment/shared";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Interface for the HTTP client.
 *
 * Only GET returning JSON is needed. The body comes back as `unknown`;
 * callers parse it against a schema.
 */
export type HttpClient = {
  /**
   * Makes a GET request and returns the parsed JSON body.
   *
   * @throws UpstreamHttpError for non-OK responses
   */
  getJson(url: string, opts?: RequestOptions): Promise<unknown>;
};

export type RequestOptions = {
  timeoutMs?: number;
  retries?: number;
};

/**
 * Configuration for creating an HTTP client.
 */
export type HttpClientConfig = {
  /** Unique identifier for request tracing */
  requestId: string;
  /** Defaults applied when a call passes no options */
  defaults?: RequestOptions;
};

export class UpstreamHttpError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText}`.trim());
    this.name = "UpstreamHttpError";
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function logRequest(
  requestId: string,
  method: string,
  url: string,
  durationMs: number,
  status?: number,
): void {
  const statusStr = status ? ` ${status}` : "";
  console.log(
    `[${requestId}] ${method} ${url}${statusStr} (${durationMs.toFixed(2)}ms)`,
  );
}

function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

/**
 * True for an aborted request (our timeout).
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * True for failures where no HTTP response was received: a timeout or a
 * network-level error. These are the only failures worth retrying.
 */
export function isTransportError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return isTimeoutError(error) || error instanceof TypeError;
}

// ============================================================================
// CLIENT FACTORY
// ============================================================================

/**
 * Creates an HTTP client with request tracing.
 *
 * @example
 * const http = createHttpClient({ requestId: ctx.requestId });
 * const body = await http.getJson("https://pokeapi.co/api/v2/pokemon/pikachu", {
 *   timeoutMs: 10_000,
 * });
 */
export function createHttpClient(config: HttpClientConfig): HttpClient {
  const { requestId, defaults } = config;

  async function getJson(url: string, opts?: RequestOptions): Promise<unknown> {
    const timeoutMs = opts?.timeoutMs ?? defaults?.timeoutMs ?? 5000;
    const maxRetries = opts?.retries ?? defaults?.retries ?? 0;

    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
      const start = process.hrtime.bigint();

      try {
        const response = await fetch(url, {
          method: "GET",
          signal: controller.signal,
          headers: {
            Accept: "application/json",
            "X-Request-ID": requestId,
          },
        });

        logRequest(requestId, "GET", url, elapsedMs(start), response.status);

        if (!response.ok) {
          // Drain the body so the connection can be reused.
          await response.text().catch(() => "");
          throw new UpstreamHttpError(url, response.status, response.statusText);
        }

        const body: unknown = await response.json();
        return body;
      } catch (error) {
        lastError = error;

        if (error instanceof UpstreamHttpError) {
          throw error;
        }

        console.error(
          `[${requestId}] GET ${url} FAILED (${elapsedMs(start).toFixed(2)}ms):`,
          error instanceof Error ? error.message : error,
        );

        if (!isTransportError(error) || attempt >= maxRetries) {
          throw error;
        }

        const backoffMs = 100 * (attempt + 1);
        console.log(`[${requestId}] Retrying in ${backoffMs}ms...`);
        await sleep(backoffMs);
      } finally {
        clearTimeout(timeoutId);
      }
    }

    // Unreachable: the last attempt either returns or throws.
    throw lastError;
  }

  return { getJson };
}
