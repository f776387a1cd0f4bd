/**
 * Cursor-based pagination over index-ordered lists.
 *
 * Cursors are base64url-encoded JSON objects: { k, i } where `k` names
 * the list and `i` is the last index returned. List endpoints return
 * { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(kind: string, lastIndex: number): string {
  return Buffer.from(JSON.stringify({ k: kind, i: lastIndex })).toString("base64url");
}

/**
 * Decode a cursor for list `kind`.
 *
 * @returns The last index, or undefined if the cursor is malformed or
 *   belongs to another list.
 */
export function decodeCursor(cursor: string, kind: string): number | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (
    typeof data === "object" &&
    data !== null &&
    "k" in data &&
    "i" in data &&
    data.k === kind &&
    typeof data.i === "number" &&
    Number.isInteger(data.i)
  ) {
    return data.i;
  }
  return undefined;
}

/**
 * Page through items sorted by ascending `index`. An invalid cursor
 * starts from the beginning.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  indexOf: (item: T) => number,
  kind: string,
): PaginatedResponse<T> {
  const after = query.cursor === undefined ? undefined : decodeCursor(query.cursor, kind);
  const remaining = after === undefined
    ? items
    : items.filter((item) => indexOf(item) > after);

  // Fetch one extra to detect hasMore
  const page = remaining.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor = hasMore && last !== undefined ? encodeCursor(kind, indexOf(last)) : null;
  return { data, pagination: { cursor, hasMore } };
}
