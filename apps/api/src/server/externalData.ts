/**
 * @fileoverview External data aggregation: paging, search and a read-through
 * detail cache over the upstream Pokémon API
 *
 * THE FLOW (no search):
 * 1. Fetch one list slice upstream: offset = (page - 1) * limit
 * 2. Resolve every entry to a detail record concurrently
 * 3. Drop entries that could not be resolved
 * 4. Return the records in list order with page/total/has_more
 *
 * WITH A SEARCH TERM:
 * The first `searchScanLimit` list entries (1000 by default) are fetched
 * from offset 0 and filtered by case-insensitive substring match. Paging is
 * applied to the filtered list and only that page is resolved. Entries past
 * the scan cap are never matched.
 *
 * CACHING:
 * Detail records are cached by lowercase name for the lifetime of the cache
 * object. A cached name is never fetched again.
 */

import type { Pokemon, PokemonPage, PokemonPageQuery } from "@assessment/shared";
import { hasMorePages, pageOffset, slicePage } from "@assessment/shared";

import { NameCache } from "./cache.js";
import { ApiError, InternalError, NotFoundError, UpstreamError } from "./errors.js";
import {
  fetchPokemonDetail,
  fetchPokemonList,
  isDetailName,
  toPokemon,
  type ExternalListEntry,
  type UpstreamConfig,
} from "./external/index.js";
import { isTimeoutError, isTransportError, UpstreamHttpError, type HttpClient } from "./httpClient.js";

// ============================================================================
// TYPES
// ============================================================================

export type ExternalDataService = {
  /**
   * Returns the record for `name`, from cache or upstream.
   * Resolves to null when upstream does not know the name, times out or is
   * unreachable.
   */
  resolveDetail(http: HttpClient, name: string): Promise<Pokemon | null>;

  /**
   * Returns one page of records.
   *
   * @throws UpstreamError when the list call answers with a non-OK status
   * @throws InternalError for anything unexpected
   */
  getPage(http: HttpClient, query: PokemonPageQuery): Promise<PokemonPage>;

  /**
   * @throws NotFoundError when the resolver yields nothing
   */
  getByName(http: HttpClient, name: string): Promise<Pokemon>;
};

export type ExternalDataOptions = {
  config: UpstreamConfig;
  cache?: NameCache<Pokemon>;
};

const LOG_TAG = "[external-data]";

// ============================================================================
// SERVICE FACTORY
// ============================================================================

/**
 * Creates the aggregator around one detail cache.
 *
 * @example
 * const externalData = createExternalDataService({ config: config.upstream });
 * const http = createHttpClient({ requestId: ctx.requestId });
 * const page = await externalData.getPage(http, { page: 1, limit: 10 });
 */
export function createExternalDataService(
  options: ExternalDataOptions,
): ExternalDataService {
  const { config } = options;
  const cache = options.cache ?? new NameCache<Pokemon>();

  async function resolveDetail(
    http: HttpClient,
    name: string,
  ): Promise<Pokemon | null> {
    const cached = cache.get(name);
    if (cached) {
      console.log(`${LOG_TAG} cache HIT ${name.toLowerCase()}`);
      return cached;
    }

    if (!isDetailName(name)) {
      console.warn(`${LOG_TAG} detail skipped name=${name}: not a path segment`);
      return null;
    }

    try {
      const external = await fetchPokemonDetail(http, config, name);
      return cache.set(name, toPokemon(external));
    } catch (error) {
      if (error instanceof UpstreamHttpError) {
        console.warn(`${LOG_TAG} detail dropped name=${name}:`, error.message);
        return null;
      }

      if (isTransportError(error)) {
        const reason = isTimeoutError(error) ? "timed out" : "unreachable";
        console.warn(
          `${LOG_TAG} detail ${reason} name=${name}:`,
          error instanceof Error ? error.message : error,
        );
        return null;
      }

      throw error;
    }
  }

  /**
   * Resolves all entries concurrently. Output keeps list order whatever the
   * completion order; unresolved entries are dropped.
   */
  async function resolveAll(
    http: HttpClient,
    entries: ExternalListEntry[],
  ): Promise<Pokemon[]> {
    const resolved = await Promise.all(
      entries.map((entry) => resolveDetail(http, entry.name)),
    );
    return resolved.filter((p): p is Pokemon => p !== null);
  }

  async function fetchList(
    http: HttpClient,
    slice: { offset: number; limit: number },
  ) {
    try {
      return await fetchPokemonList(http, config, slice);
    } catch (error) {
      if (error instanceof UpstreamHttpError) {
        throw new UpstreamError(error.status);
      }
      throw error;
    }
  }

  async function buildPage(
    http: HttpClient,
    query: PokemonPageQuery,
  ): Promise<PokemonPage> {
    const { page, limit } = query;
    const search = query.search?.toLowerCase();

    if (search) {
      const list = await fetchList(http, {
        offset: 0,
        limit: config.searchScanLimit,
      });
      const matches = list.results.filter((entry) =>
        entry.name.toLowerCase().includes(search),
      );
      const pokemon = await resolveAll(http, slicePage(matches, page, limit));

      return {
        pokemon,
        page,
        total: matches.length,
        has_more: hasMorePages(page, limit, matches.length),
      };
    }

    const list = await fetchList(http, {
      offset: pageOffset(page, limit),
      limit,
    });
    const pokemon = await resolveAll(http, list.results);

    return {
      pokemon,
      page,
      total: list.count,
      has_more: hasMorePages(page, limit, list.count),
    };
  }

  async function getPage(
    http: HttpClient,
    query: PokemonPageQuery,
  ): Promise<PokemonPage> {
    try {
      return await buildPage(http, query);
    } catch (error) {
      if (error instanceof ApiError) throw error;

      console.error(
        `${LOG_TAG} page FAIL page=${query.page} limit=${query.limit} search=${query.search ?? ""}`,
        error,
      );
      throw new InternalError(error);
    }
  }

  async function getByName(http: HttpClient, name: string): Promise<Pokemon> {
    let pokemon: Pokemon | null;
    try {
      pokemon = await resolveDetail(http, name);
    } catch (error) {
      console.error(`${LOG_TAG} lookup FAIL name=${name}`, error);
      throw new InternalError(error);
    }

    if (!pokemon) {
      throw new NotFoundError("Pokemon not found");
    }
    return pokemon;
  }

  return { resolveDetail, getPage, getByName };
}
