/**
 * @fileoverview Functions for fetching data from the upstream Pokémon API
 *
 * All upstream URLs, timeouts and response parsing live here. The rest of
 * the server calls `fetchPokemonList()` / `fetchPokemonDetail()` and gets
 * validated values back, never raw JSON.
 */

import type { Pokemon } from "@assessment/shared";

import type { HttpClient } from "../httpClient.js";
import type { AppConfig } from "../env.js";
import {
  externalPokemonListSchema,
  externalPokemonSchema,
  type ExternalPokemon,
  type ExternalPokemonList,
} from "./types.js";

export type UpstreamConfig = AppConfig["upstream"];

// ============================================================================
// URL BUILDERS
// ============================================================================

export function listUrl(
  baseUrl: string,
  slice: { offset: number; limit: number },
): string {
  const url = new URL(baseUrl);
  url.searchParams.set("offset", String(slice.offset));
  url.searchParams.set("limit", String(slice.limit));
  return url.toString();
}

/**
 * False for "." and "..": URL parsing folds them (and their %2E forms) into
 * the parent path, so they can never address a detail record.
 */
export function isDetailName(name: string): boolean {
  return name !== "." && name !== "..";
}

export function detailUrl(baseUrl: string, name: string): string {
  return `${baseUrl}${encodeURIComponent(name.toLowerCase())}`;
}

// ============================================================================
// API FUNCTIONS
// ============================================================================

/**
 * Fetches one slice of the upstream list.
 *
 * @throws UpstreamHttpError when upstream answers with a non-OK status
 * @throws ZodError when the body is not a list response
 *
 * @example
 * const list = await fetchPokemonList(http, config.upstream, { offset: 0, limit: 10 });
 * list.count; // 1302
 */
export async function fetchPokemonList(
  http: HttpClient,
  config: UpstreamConfig,
  slice: { offset: number; limit: number },
): Promise<ExternalPokemonList> {
  const body = await http.getJson(listUrl(config.baseUrl, slice), {
    timeoutMs: config.timeoutMs,
    retries: config.retries,
  });

  return externalPokemonListSchema.parse(body);
}

/**
 * Fetches the detail document for one name (lowercased before the call).
 *
 * @throws UpstreamHttpError when upstream answers with a non-OK status
 * @throws ZodError when the body lacks a required detail field
 */
export async function fetchPokemonDetail(
  http: HttpClient,
  config: UpstreamConfig,
  name: string,
): Promise<ExternalPokemon> {
  const body = await http.getJson(detailUrl(config.baseUrl, name), {
    timeoutMs: config.timeoutMs,
    retries: config.retries,
  });

  return externalPokemonSchema.parse(body);
}

// ============================================================================
// TRANSFORMS
// ============================================================================

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Object.getOwnPropertyDescriptor(value, key)?.value;
}

/**
 * Reads `sprites.other["official-artwork"].front_default`.
 * Any missing or malformed link on the path yields null.
 */
export function extractArtworkUrl(sprites: unknown): string | null {
  const url = field(field(field(sprites, "other"), "official-artwork"), "front_default");
  return typeof url === "string" ? url : null;
}

/**
 * Transforms the upstream detail document to our `Pokemon` record.
 */
export function toPokemon(external: ExternalPokemon): Pokemon {
  return {
    id: external.id,
    name: external.name,
    height: external.height,
    weight: external.weight,
    types: external.types.map((t) => t.type.name),
    image_url: extractArtworkUrl(external.sprites),
  };
}
