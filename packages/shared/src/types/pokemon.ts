/**
 * @fileoverview Wire types for the external data resource
 *
 * These are the shapes returned by `/external_data`. Field names follow the
 * JSON the clients already consume (`image_url`, `has_more`), so they are
 * snake_case even though the rest of the codebase is camelCase.
 */

// ============================================================================
// DETAIL RECORD
// ============================================================================

/**
 * A single enriched record built from the upstream detail endpoint.
 *
 * @example
 * const bulbasaur: Pokemon = {
 *   id: 1,
 *   name: "bulbasaur",
 *   height: 7,
 *   weight: 69,
 *   types: ["grass", "poison"],
 *   image_url: "https://img.example.test/1.png",
 * };
 */
export type Pokemon = {
  /** Upstream identifier */
  id: number;
  /** Canonical (lowercase) name */
  name: string;
  /** Height in decimetres, as reported upstream */
  height: number;
  /** Weight in hectograms, as reported upstream */
  weight: number;
  /** Category tag names in upstream order */
  types: string[];
  /** Official artwork URL, null when upstream has none */
  image_url: string | null;
};

// ============================================================================
// PAGE ENVELOPE
// ============================================================================

/**
 * One page of records plus pagination metadata.
 *
 * `total` is the upstream count for plain paging and the filtered count when
 * a search term was given. `has_more` is `offset + limit < total`.
 */
export type PokemonPage = {
  pokemon: Pokemon[];
  page: number;
  total: number;
  has_more: boolean;
};

/**
 * Query accepted by the page aggregator.
 */
export type PokemonPageQuery = {
  /** 1-based page number */
  page: number;
  /** Page size, 1..50 */
  limit: number;
  /** Case-insensitive substring filter on the name */
  search?: string;
};
