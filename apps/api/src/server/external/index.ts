/**
 * @fileoverview Upstream API module exports
 *
 * Import from here instead of reaching into individual files:
 *
 * ```typescript
 * import { fetchPokemonList, toPokemon } from "./external/index.js";
 * ```
 */

export * from "./types.js";
export * from "./api.js";
