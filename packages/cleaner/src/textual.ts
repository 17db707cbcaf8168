import { filterQuery, parseQuery, serializeQuery } from "./query";
import type { RemovalSet } from "./removal_set";
import type { CleanOutcome } from "./types";

/**
 * Fallback for URL-ish strings the parser rejects (relative paths, missing
 * scheme, partially escaped text). Splits at the first `?` and on `&`, with no
 * decoding: a percent-encoded tracking name such as `utm%5Fsource` is not
 * recognized here. Everything after the first `?`, fragment included, is
 * treated as query.
 */
export function cleanTextual(text: string, removal: RemovalSet): CleanOutcome {
  const queryIndex = text.indexOf("?");
  if (queryIndex === -1) {
    return { cleaned: text, removed: [], path: "none" };
  }

  const base = text.slice(0, queryIndex);
  const { kept, removed } = filterQuery(parseQuery(text.slice(queryIndex + 1)), removal);

  return {
    cleaned: kept.length === 0 ? base : `${base}?${serializeQuery(kept)}`,
    removed: removed.map((item) => item.rawName),
    path: "textual",
  };
}
