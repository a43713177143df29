/**
 * Cursor pages over event lists.
 *
 * A cursor records the ordering it was issued for and the last position a
 * page returned, as base64url text "<order>:<position>". List endpoints
 * answer { data, pagination: { cursor, hasMore } }.
 */

/** Orderings an event list can be paged by. */
export type EventOrder = "globalPosition" | "version";

export interface PageCursor {
  readonly order: EventOrder;
  readonly after: number;
}

export interface PageRequest {
  readonly cursor?: PageCursor | undefined;
  readonly limit: number;
}

export interface Page<T> {
  readonly data: readonly T[];
  readonly pagination: {
    readonly cursor: string | null;
    readonly hasMore: boolean;
  };
}

const CURSOR_TEXT = /^(globalPosition|version):(\d{1,15})$/;

export function encodeCursor(cursor: PageCursor): string {
  return Buffer.from(`${cursor.order}:${cursor.after}`).toString("base64url");
}

/**
 * @returns The cursor, or undefined for a token this module did not issue
 */
export function decodeCursor(token: string): PageCursor | undefined {
  const match = CURSOR_TEXT.exec(Buffer.from(token, "base64url").toString("utf-8"));
  const order = match?.[1];
  const after = match?.[2];
  if ((order !== "globalPosition" && order !== "version") || after === undefined) {
    return undefined;
  }
  return { order, after: Number(after) };
}

/**
 * Take one page from `items`, which must be sorted ascending by `positionOf`.
 * A cursor issued for another ordering starts from the beginning.
 */
export function pageOf<T>(
  items: readonly T[],
  order: EventOrder,
  positionOf: (item: T) => number,
  request: PageRequest,
): Page<T> {
  const after = request.cursor?.order === order ? request.cursor.after : undefined;
  const remaining = after === undefined ? items : items.filter((item) => positionOf(item) > after);

  const data = remaining.slice(0, request.limit);
  const hasMore = remaining.length > request.limit;
  const last = data.at(-1);

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor({ order, after: positionOf(last) }) : null,
      hasMore,
    },
  };
}
