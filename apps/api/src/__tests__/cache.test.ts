import { describe, expect, it } from "vitest";

import { NameCache } from "../server/cache.js";

describe("NameCache", () => {
  it("looks names up case-insensitively", () => {
    const cache = new NameCache<number>();
    cache.set("Pikachu", 25);

    expect(cache.get("pikachu")).toBe(25);
    expect(cache.get("PIKACHU")).toBe(25);
    expect(cache.get("piKachu")).toBe(25);
  });

  it("returns null for absent names", () => {
    expect(new NameCache<number>().get("eevee")).toBeNull();
  });

  it("keeps the first value written for a key", () => {
    const cache = new NameCache<{ id: number }>();
    const first = { id: 1 };

    expect(cache.set("bulbasaur", first)).toBe(first);
    expect(cache.set("BULBASAUR", { id: 99 })).toBe(first);
    expect(cache.get("bulbasaur")).toBe(first);
    expect(cache.size).toBe(1);
  });
});
