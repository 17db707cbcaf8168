/**
 * Structural cleaning for input the WHATWG URL parser accepts.
 *
 * The parser decides whether the input is a URL. The rewrite works on the
 * input text, so everything except the removed items comes back exactly as
 * written: hosts are not punycoded and values are not re-encoded.
 */

import { createLogger, tryOr } from "@linkscrub/shared";
import { filterQuery, parseQuery, serializeQuery } from "./query";
import type { RemovalSet } from "./removal_set";
import type { CleanOutcome } from "./types";

const log = createLogger({ component: "cleaner" });

export interface UrlTextParts {
  /** Scheme, authority and path */
  base: string;
  /** Raw query without `?`; null when the URL has no query component */
  query: string | null;
  /** Raw fragment without `#`; null when absent */
  fragment: string | null;
}

export function parseUrl(text: string): URL | null {
  return tryOr<URL | null>(() => new URL(text), null);
}

/**
 * Locate the query and fragment in URL text. A `?` after the first `#`
 * belongs to the fragment.
 */
export function splitUrlText(text: string): UrlTextParts {
  const hashIndex = text.indexOf("#");
  const beforeHash = hashIndex === -1 ? text : text.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? null : text.slice(hashIndex + 1);

  const queryIndex = beforeHash.indexOf("?");
  if (queryIndex === -1) {
    return { base: beforeHash, query: null, fragment };
  }
  return {
    base: beforeHash.slice(0, queryIndex),
    query: beforeHash.slice(queryIndex + 1),
    fragment,
  };
}

export function joinUrlText(parts: UrlTextParts): string {
  let out = parts.base;
  if (parts.query !== null && parts.query.length > 0) out += `?${parts.query}`;
  if (parts.fragment !== null) out += `#${parts.fragment}`;
  return out;
}

/**
 * Parse cleaned text back into a URL, or copy `fallback` when it no longer parses.
 */
export function reparseUrl(text: string, fallback: URL): URL {
  return parseUrl(text) ?? new URL(fallback.href);
}

function decodeName(rawName: string): string {
  return tryOr(
    () => decodeURIComponent(rawName),
    rawName,
    (err) => log.debug({ name: rawName, err }, "Query parameter name is not valid percent-encoding"),
  );
}

/**
 * Clean URL text that is known to parse. Returns the input unchanged when
 * there is no query, or when the rewritten text no longer parses.
 */
export function cleanStructural(text: string, removal: RemovalSet): CleanOutcome {
  const parts = splitUrlText(text);
  if (parts.query === null) {
    return { cleaned: text, removed: [], path: "none" };
  }

  const { kept, removed } = filterQuery(parseQuery(parts.query, decodeName), removal);
  const cleaned = joinUrlText({ ...parts, query: serializeQuery(kept) });

  if (cleaned !== text && parseUrl(cleaned) === null) {
    log.debug({ url: text, cleaned }, "Cleaned URL failed to parse; keeping original");
    return { cleaned: text, removed: [], path: "structural" };
  }

  return {
    cleaned,
    removed: removed.map((item) => item.rawName),
    path: "structural",
  };
}
