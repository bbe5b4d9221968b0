/**
 * @fileoverview Schemas for the upstream Pokémon API responses
 *
 * The upstream has its own response format, much larger than what we use.
 * Each schema lists only the fields we read; everything else is stripped
 * by zod. Responses are parsed, not cast, so a changed upstream contract
 * fails loudly at this boundary instead of leaking `undefined` into the
 * wire types.
 *
 * EXTERNAL vs INTERNAL TYPES:
 * - External: what the upstream returns (defined here)
 * - Internal: what our API returns (`Pokemon` in @assessment/shared)
 *
 * The mapping happens in `toPokemon` (./api.ts).
 */

import { z } from "zod";

/**
 * One entry of the paginated list endpoint.
 *
 * @see https://pokeapi.co/docs/v2#resource-listsnamed-endpoint-resources
 */
export const externalListEntrySchema = z.object({
  /** Name used to request the detail record */
  name: z.string(),
  /** Detail URL; unused, we build our own from the name */
  url: z.string().optional(),
});

/**
 * `GET <base>?offset=&limit=`
 */
export const externalPokemonListSchema = z.object({
  /** Total number of resources upstream, independent of the slice */
  count: z.number().int().nonnegative(),
  results: z.array(externalListEntrySchema),
});

/**
 * `GET <base>/<name>`
 *
 * `sprites` is kept as `unknown`: the artwork path is optional at every
 * level and a malformed branch only means "no image".
 */
export const externalPokemonSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  height: z.number(),
  weight: z.number(),
  types: z.array(
    z.object({
      slot: z.number().optional(),
      type: z.object({ name: z.string() }),
    }),
  ),
  sprites: z.unknown().optional(),
});

export type ExternalListEntry = z.infer<typeof externalListEntrySchema>;
export type ExternalPokemonList = z.infer<typeof externalPokemonListSchema>;
export type ExternalPokemon = z.infer<typeof externalPokemonSchema>;
