import { describe, expect, it } from "vitest";
import { hasMorePages, pageOffset, slicePage } from "../utils/pagination.js";

describe("pagination helpers", () => {
  it("computes a zero offset for the first page", () => {
    expect(pageOffset(1, 10)).toBe(0);
  });

  it("computes the offset of later pages", () => {
    expect(pageOffset(4, 25)).toBe(75);
  });

  it("reports more pages while offset + limit is below the total", () => {
    expect(hasMorePages(1, 10, 1302)).toBe(true);
    expect(hasMorePages(2, 10, 21)).toBe(true);
  });

  it("reports no more pages once offset + limit reaches the total", () => {
    expect(hasMorePages(2, 10, 20)).toBe(false);
    expect(hasMorePages(3, 10, 25)).toBe(false);
  });

  it("slices the requested page and tolerates short tails", () => {
    const items = ["a", "b", "c", "d", "e"];
    expect(slicePage(items, 1, 2)).toEqual(["a", "b"]);
    expect(slicePage(items, 3, 2)).toEqual(["e"]);
    expect(slicePage(items, 4, 2)).toEqual([]);
  });
});
