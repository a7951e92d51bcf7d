/**
 * Cursor-based pagination utilities
 */

export interface CursorPayload {
  sortValue: string | number;
  id: string;
  direction: "forward" | "backward";
}

export interface PaginationMeta {
  cursor: string | null;
  hasMore: boolean;
  limit: number;
  total?: number;
}

/**
 * Encode cursor payload to base64url string
 */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload)).toString("base64url");
}

/**
 * Decode base64url cursor string to payload
 */
export function decodeCursor(cursor: string): unknown {
  try {
    const decoded = Buffer.from(cursor, "base64url").toString("utf-8");
    return JSON.parse(decoded);
  } catch {
    return null;
  }
}

/**
 * Create pagination meta from results
 */
export function createPaginationMeta<T extends { id: string }>(
  items: T[],
  limit: number,
  sortValue: (item: T) => string | number,
  hasMore: boolean,
  total?: number
): PaginationMeta {
  let cursor: string | null = null;

  const lastItem = items.at(-1);
  if (hasMore && lastItem !== undefined) {
    cursor = encodeCursor({
      sortValue: sortValue(lastItem),
      id: lastItem.id,
      direction: "forward",
    });
  }

  return {
    cursor,
    hasMore,
    limit,
    total,
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

/**
 * Validate cursor and extract payload
 */
export function validateCursor(
  cursor: string | undefined
): CursorPayload | null {
  if (cursor === undefined || cursor === "") {
    return null;
  }

  const payload = decodeCursor(cursor);
  if (typeof payload !== "object" || payload === null) {
    return null;
  }

  // Validate payload structure
  if (!("sortValue" in payload) || !("id" in payload)) {
    return null;
  }
  const { sortValue, id } = payload;
  if (typeof sortValue !== "string" && typeof sortValue !== "number") {
    return null;
  }
  if (typeof id !== "string") {
    return null;
  }

  const direction =
    "direction" in payload && payload.direction === "backward"
      ? "backward"
      : "forward";

  return { sortValue, id, direction };
}
