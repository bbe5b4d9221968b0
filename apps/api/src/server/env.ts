/**
 * @fileoverview Runtime configuration read from environment variables
 *
 * Every setting has a default so the server starts with no environment at
 * all. Invalid values fail fast at startup with the variable name in the
 * message.
 */

export type AppConfig = {
  port: number;
  upstream: {
    /** Base URL of the upstream list/detail API, always ending in "/" */
    baseUrl: string;
    timeoutMs: number;
    retries: number;
    /** How many list entries are scanned when a search term is given */
    searchScanLimit: number;
  };
  chat: {
    replyDelayMs: number;
  };
  corsOrigin: string;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_POKEMON_API_URL = "https://pokeapi.co/api/v2/pokemon/";

export function getPort(env: Env = process.env, defaultPort = 8000): number {
  const raw = env.PORT;

  if (raw == null || raw.trim() === "") {
    return defaultPort;
  }

  const port = Number(raw);

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(
      `Invalid PORT value "${raw}". Expected an integer between 1 and 65535.`,
    );
  }

  return port;
}

function readInt(env: Env, name: string, defaultValue: number, min: number): number {
  const raw = env[name];

  if (raw == null || raw.trim() === "") {
    return defaultValue;
  }

  const value = Number(raw);

  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `Invalid ${name} value "${raw}". Expected an integer >= ${min}.`,
    );
  }

  return value;
}

function readUrl(env: Env, name: string, defaultValue: string): string {
  const raw = env[name]?.trim() || defaultValue;

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Invalid ${name} value "${raw}". Expected an absolute URL.`);
  }

  // Detail URLs are built by appending the name to the base.
  if (!url.pathname.endsWith("/")) {
    url.pathname = `${url.pathname}/`;
  }

  return url.toString();
}

/**
 * Builds the full configuration.
 *
 * @example
 * const config = loadConfig({ PORT: "3001", CHAT_REPLY_DELAY_MS: "0" });
 * config.upstream.timeoutMs; // 10000
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: getPort(env),
    upstream: {
      baseUrl: readUrl(env, "POKEMON_API_URL", DEFAULT_POKEMON_API_URL),
      timeoutMs: readInt(env, "UPSTREAM_TIMEOUT_MS", 10_000, 1),
      retries: readInt(env, "UPSTREAM_RETRIES", 0, 0),
      searchScanLimit: readInt(env, "SEARCH_SCAN_LIMIT", 1000, 1),
    },
    chat: {
      replyDelayMs: readInt(env, "CHAT_REPLY_DELAY_MS", 1000, 0),
    },
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
  };
}
