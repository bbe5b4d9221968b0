import { describe, expect, it, vi } from "vitest";

import {
  detailUrl,
  extractArtworkUrl,
  fetchPokemonDetail,
  fetchPokemonList,
  isDetailName,
  listUrl,
  toPokemon,
} from "../server/external/index.js";
import { TEST_BASE_URL, detailBody, testUpstreamConfig } from "./fakeUpstream.js";

describe("upstream URLs", () => {
  it("puts offset and limit on the list URL", () => {
    expect(listUrl(TEST_BASE_URL, { offset: 40, limit: 20 })).toBe(
      "https://upstream.test/api/v2/pokemon/?offset=40&limit=20",
    );
  });

  it("lowercases and encodes the detail name", () => {
    expect(detailUrl(TEST_BASE_URL, "Mr-Mime")).toBe(
      "https://upstream.test/api/v2/pokemon/mr-mime",
    );
    expect(detailUrl(TEST_BASE_URL, "farfetch'd?x")).toBe(
      "https://upstream.test/api/v2/pokemon/farfetch'd%3Fx",
    );
  });
});

describe("isDetailName", () => {
  it("rejects the dot segments and nothing else", () => {
    expect(isDetailName(".")).toBe(false);
    expect(isDetailName("..")).toBe(false);
    expect(isDetailName("mr.mime")).toBe(true);
    expect(isDetailName("...")).toBe(true);
  });
});

describe("extractArtworkUrl", () => {
  it("reads the official artwork link", () => {
    expect(
      extractArtworkUrl({
        other: { "official-artwork": { front_default: "https://img.test/a.png" } },
      }),
    ).toBe("https://img.test/a.png");
  });

  it("yields null for any missing or malformed link on the path", () => {
    expect(extractArtworkUrl(undefined)).toBeNull();
    expect(extractArtworkUrl({})).toBeNull();
    expect(extractArtworkUrl({ other: null })).toBeNull();
    expect(extractArtworkUrl({ other: "nope" })).toBeNull();
    expect(extractArtworkUrl({ other: { "official-artwork": {} } })).toBeNull();
    expect(
      extractArtworkUrl({ other: { "official-artwork": { front_default: null } } }),
    ).toBeNull();
  });
});

describe("toPokemon", () => {
  it("keeps the fields we serve and flattens types", () => {
    const parsed = { ...detailBody("ivysaur", 1), sprites: undefined };

    expect(toPokemon(parsed)).toEqual({
      id: 2,
      name: "ivysaur",
      height: 4,
      weight: 20,
      types: ["grass", "poison"],
      image_url: null,
    });
  });
});

describe("fetch functions", () => {
  it("parses a list response and strips unknown fields", async () => {
    const getJson = vi.fn(async () => ({
      count: 2,
      next: null,
      results: [
        { name: "bulbasaur", url: "u1" },
        { name: "ivysaur", url: "u2" },
      ],
    }));

    const list = await fetchPokemonList({ getJson }, testUpstreamConfig, {
      offset: 0,
      limit: 2,
    });

    expect(list).toEqual({
      count: 2,
      results: [
        { name: "bulbasaur", url: "u1" },
        { name: "ivysaur", url: "u2" },
      ],
    });
    expect(getJson).toHaveBeenCalledWith(`${TEST_BASE_URL}?offset=0&limit=2`, {
      timeoutMs: 10_000,
      retries: 0,
    });
  });

  it("rejects a detail body without types", async () => {
    const getJson = vi.fn(async () => ({ id: 1, name: "x", height: 1, weight: 1 }));

    await expect(
      fetchPokemonDetail({ getJson }, testUpstreamConfig, "x"),
    ).rejects.toThrow();
  });
});
