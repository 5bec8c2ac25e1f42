import { decodeCursor, encodeCursor } from './cursor.js';

/** Hard cap on page size; a cursor or default asking for more is clamped. */
export const MAX_PAGE_SIZE = 100;

export interface Page<T> {
  readonly items: readonly T[];
  /** Absent on the last page. */
  readonly nextCursor?: string;
  readonly hasMore: boolean;
  readonly returnedCount: number;
  readonly offset: number;
  readonly limit: number;
  readonly totalAvailable: number;
}

/**
 * Slice `items` into one page starting where `cursor` points (or at 0).
 *
 * Over-paging is not an error: an offset past the end saturates and yields an
 * empty last page. A corrupt cursor throws InvalidCursorError; an empty-string
 * cursor is read as "no cursor" and returns the first page.
 */
export function paginate<T>(
  items: readonly T[],
  cursor: string | undefined,
  defaultLimit: number,
): Page<T> {
  const totalItems = items.length;

  let offset = 0;
  let limit = defaultLimit;
  if (cursor) {
    ({ offset, limit } = decodeCursor(cursor));
  }

  offset = clamp(offset, 0, totalItems);
  limit = clamp(limit, 1, MAX_PAGE_SIZE);

  const pageItems = Object.freeze(items.slice(offset, offset + limit));
  const nextOffset = offset + limit;
  const hasMore = nextOffset < totalItems;

  return Object.freeze({
    items: pageItems,
    ...(hasMore ? { nextCursor: encodeCursor(nextOffset, limit, totalItems) } : {}),
    hasMore,
    returnedCount: pageItems.length,
    offset,
    limit,
    totalAvailable: totalItems,
  });
}

function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(Math.trunc(value), max));
}
