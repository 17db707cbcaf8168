/**
 * Query item filtering shared by the structural and textual paths.
 *
 * Items keep their raw text so survivors are rejoined byte-for-byte; only the
 * comparison name is ever case-folded or decoded.
 */

import type { RemovalSet } from "./removal_set";

export interface QueryItem {
  /** Token exactly as it appeared between `&` separators */
  raw: string;
  /** Name as written (text before the first `=`, or the whole token) */
  rawName: string;
  /** Name used for matching against the removal set */
  name: string;
  /** Raw value, or null for a bare flag with no `=` */
  value: string | null;
}

export interface QueryFilterResult {
  kept: QueryItem[];
  removed: QueryItem[];
}

/**
 * Split a raw query string (without the leading `?`) into items. Splitting is
 * literal, so an empty query is a single empty item.
 */
export function parseQuery(query: string, decodeName: (rawName: string) => string = (n) => n): QueryItem[] {
  return query.split("&").map((raw) => {
    const eq = raw.indexOf("=");
    const rawName = eq === -1 ? raw : raw.slice(0, eq);
    return {
      raw,
      rawName,
      name: decodeName(rawName),
      value: eq === -1 ? null : raw.slice(eq + 1),
    };
  });
}

export function filterQuery(items: readonly QueryItem[], removal: RemovalSet): QueryFilterResult {
  const kept: QueryItem[] = [];
  const removed: QueryItem[] = [];
  for (const item of items) {
    if (removal.has(item.name)) removed.push(item);
    else kept.push(item);
  }
  return { kept, removed };
}

export function serializeQuery(items: readonly QueryItem[]): string {
  return items.map((item) => item.raw).join("&");
}
