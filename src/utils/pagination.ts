/**
 * Offset pagination utilities
 */

export interface PaginationMeta {
  limit: number;
  offset: number;
  hasMore: boolean;
  nextOffset: number | null;
}

export interface PaginatedResult<T> {
  items: T[];
  pagination: PaginationMeta;
}

/**
 * Split a page fetched with `limit + 1` rows into items and meta
 */
export function paginate<T>(
  rows: T[],
  limit: number,
  offset: number
): PaginatedResult<T> {
  const hasMore = rows.length > limit;
  return {
    items: rows.slice(0, limit),
    pagination: {
      limit,
      offset,
      hasMore,
      nextOffset: hasMore ? offset + limit : null,
    },
  };
}

/**
 * Parse limit from query parameter with bounds
 */
export function parseLimit(
  value: string | number | undefined,
  defaultLimit = 50,
  maxLimit = 100
): number {
  if (value === undefined) {
    return defaultLimit;
  }

  const parsed = typeof value === "string" ? parseInt(value, 10) : value;

  if (isNaN(parsed) || parsed < 1) {
    return defaultLimit;
  }

  return Math.min(parsed, maxLimit);
}
