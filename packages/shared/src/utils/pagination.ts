/**
 * @fileoverview Offset pagination arithmetic
 *
 * Pages are 1-based. For page `p` of size `n` the slice starts at
 * `(p - 1) * n`, and more results exist while `offset + n < total`.
 *
 * @example
 * pageOffset(3, 10); // 20
 * hasMorePages(3, 10, 25); // false (20 + 10 >= 25)
 */

export function pageOffset(page: number, limit: number): number {
  return (page - 1) * limit;
}

export function hasMorePages(
  page: number,
  limit: number,
  total: number
): boolean {
  return pageOffset(page, limit) + limit < total;
}

/**
 * Returns the items of `items` that belong to the given page.
 */
export function slicePage<T>(items: readonly T[], page: number, limit: number): T[] {
  const offset = pageOffset(page, limit);
  return items.slice(offset, offset + limit);
}
