/**
 * URL Cleaner
 *
 * One primitive, `cleanUrl(url, removing)`, removes every query item whose
 * name (case-insensitive) is in the removal set. The convenience wrappers only
 * pick a different removal set.
 *
 * Strings go through the structural path when the URL parser accepts them and
 * through the textual fallback otherwise. `URL` objects always take the
 * structural path and come back as new instances. Nothing here throws: input
 * that cannot be cleaned safely is returned as it was.
 */

import { allParameters, categoryParameters, parameters, type Category } from "@linkscrub/params";
import { RemovalSet, toRemovalSet, type RemovalInput } from "./removal_set";
import { cleanStructural, parseUrl, reparseUrl } from "./structural";
import { cleanTextual } from "./textual";
import type { CleanOutcome, CleanUrlResult, UrlLike } from "./types";

// ============================================================================
// Removal sets backed by the database
// ============================================================================

const ALL_TRACKING = RemovalSet.of(allParameters());

const CATEGORY_REMOVAL = new Map<Category, RemovalSet>();

export function trackingRemovalSet(): RemovalSet {
  return ALL_TRACKING;
}

export function categoryRemovalSet(category: Category): RemovalSet {
  let set = CATEGORY_REMOVAL.get(category);
  if (!set) {
    set = RemovalSet.of(categoryParameters(category));
    CATEGORY_REMOVAL.set(category, set);
  }
  return set;
}

// ============================================================================
// Core
// ============================================================================

export function cleanText(text: string, removal: RemovalSet): CleanOutcome {
  if (text.length === 0 || !text.includes("?")) {
    return { cleaned: text, removed: [], path: "none" };
  }
  if (parseUrl(text) === null) {
    return cleanTextual(text, removal);
  }
  return cleanStructural(text, removal);
}

function cleanUrlObject(url: URL, removal: RemovalSet): URL {
  return reparseUrl(cleanStructural(url.href, removal).cleaned, url);
}

/**
 * Remove query items named in `removing` from a URL string or `URL`.
 * Returns a new value of the same type; the input is never modified.
 */
export function cleanUrl(url: string, removing: RemovalInput): string;
export function cleanUrl(url: URL, removing: RemovalInput): URL;
export function cleanUrl(url: UrlLike, removing: RemovalInput): UrlLike;
export function cleanUrl(url: UrlLike, removing: RemovalInput): UrlLike {
  const removal = toRemovalSet(removing);
  if (typeof url === "string") return cleanText(url, removal).cleaned;
  return cleanUrlObject(url, removal);
}

/**
 * Clean and report what happened: which names were removed and which path
 * handled the input.
 */
export function inspectUrl(url: UrlLike, removing: RemovalInput): CleanUrlResult {
  const original = typeof url === "string" ? url : url.href;
  const outcome = cleanText(original, toRemovalSet(removing));
  return {
    original,
    cleaned: outcome.cleaned,
    changed: outcome.cleaned !== original,
    removedParams: outcome.removed,
    path: outcome.path,
  };
}

/** Clean many URLs against one removal set, normalized once. */
export function cleanUrls(urls: readonly string[], removing: RemovalInput): string[];
export function cleanUrls(urls: readonly URL[], removing: RemovalInput): URL[];
export function cleanUrls(urls: readonly UrlLike[], removing: RemovalInput): UrlLike[];
export function cleanUrls(urls: readonly UrlLike[], removing: RemovalInput): UrlLike[] {
  const removal = toRemovalSet(removing);
  return urls.map((url) => cleanUrl(url, removal));
}

// ============================================================================
// Convenience wrappers
// ============================================================================

/** A cleaning function bound to a fixed removal set. */
export interface CleanFn {
  (url: string): string;
  (url: URL): URL;
  (url: UrlLike): UrlLike;
}

export function bindRemovalSet(removal: RemovalSet): CleanFn {
  function clean(url: string): string;
  function clean(url: URL): URL;
  function clean(url: UrlLike): UrlLike;
  function clean(url: UrlLike): UrlLike {
    return cleanUrl(url, removal);
  }
  return clean;
}

/** Remove every known tracking parameter. */
export const withoutTracking: CleanFn = bindRemovalSet(ALL_TRACKING);

export const withoutAnalytics: CleanFn = bindRemovalSet(categoryRemovalSet("analytics"));
export const withoutSocial: CleanFn = bindRemovalSet(categoryRemovalSet("social"));
export const withoutEmail: CleanFn = bindRemovalSet(categoryRemovalSet("email"));
export const withoutEcommerce: CleanFn = bindRemovalSet(categoryRemovalSet("ecommerce"));
export const withoutOther: CleanFn = bindRemovalSet(categoryRemovalSet("other"));

/** Remove the tracking parameters of the given categories only. */
export function withoutCategories(url: string, categories: Iterable<Category>): string;
export function withoutCategories(url: URL, categories: Iterable<Category>): URL;
export function withoutCategories(url: UrlLike, categories: Iterable<Category>): UrlLike;
export function withoutCategories(url: UrlLike, categories: Iterable<Category>): UrlLike {
  return cleanUrl(url, parameters(categories));
}

/** Remove every known tracking parameter plus `extra`. */
export function withoutTrackingAnd(url: string, extra: RemovalInput): string;
export function withoutTrackingAnd(url: URL, extra: RemovalInput): URL;
export function withoutTrackingAnd(url: UrlLike, extra: RemovalInput): UrlLike;
export function withoutTrackingAnd(url: UrlLike, extra: RemovalInput): UrlLike {
  return cleanUrl(url, RemovalSet.union(ALL_TRACKING, extra));
}

/** Remove only `names`; tracking parameters not listed are kept. */
export function withoutParams(url: string, names: RemovalInput): string;
export function withoutParams(url: URL, names: RemovalInput): URL;
export function withoutParams(url: UrlLike, names: RemovalInput): UrlLike;
export function withoutParams(url: UrlLike, names: RemovalInput): UrlLike {
  return cleanUrl(url, names);
}
