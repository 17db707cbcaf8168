/**
 * Tracking Parameter Database
 *
 * Curated, versioned lists of query parameter names used for attribution by
 * analytics, social, email, e-commerce and other platforms. The lists live in
 * `data/tracking_parameters.json`; changing them changes cleaning output for
 * existing URLs, so every edit bumps `version` there.
 *
 * A name may be listed under several categories (`ref`, `hash`, `smid`,
 * `share_from`, ...). Platforms reuse generic names, so removing one category
 * can also remove a name another category lists.
 */

import { createLogger } from "@linkscrub/shared";
import trackingData from "../data/tracking_parameters.json";
import { ALL_CATEGORIES, type Category } from "./types";

const log = createLogger({ component: "params" });

// ============================================================================
// Load (once per process)
// ============================================================================

export const PARAMETER_DATABASE_VERSION: string = trackingData.version;

function toLowerSet(names: readonly string[]): ReadonlySet<string> {
  return new Set(names.map((name) => name.toLowerCase()));
}

const BY_CATEGORY: Readonly<Record<Category, ReadonlySet<string>>> = {
  analytics: toLowerSet(trackingData.categories.analytics),
  social: toLowerSet(trackingData.categories.social),
  email: toLowerSet(trackingData.categories.email),
  ecommerce: toLowerSet(trackingData.categories.ecommerce),
  other: toLowerSet(trackingData.categories.other),
};

const ALL: ReadonlySet<string> = unionOf(ALL_CATEGORIES);

log.debug(
  {
    version: PARAMETER_DATABASE_VERSION,
    total: ALL.size,
    analytics: BY_CATEGORY.analytics.size,
    social: BY_CATEGORY.social.size,
    email: BY_CATEGORY.email.size,
    ecommerce: BY_CATEGORY.ecommerce.size,
    other: BY_CATEGORY.other.size,
  },
  "Tracking parameter database loaded",
);

function unionOf(categories: Iterable<Category>): Set<string> {
  const result = new Set<string>();
  for (const category of categories) {
    for (const name of BY_CATEGORY[category]) result.add(name);
  }
  return result;
}

// ============================================================================
// Lookups
// ============================================================================

/**
 * Every known tracking parameter, lowercased. The same set instance is
 * returned on every call.
 */
export function allParameters(): ReadonlySet<string> {
  return ALL;
}

/**
 * Union of the given categories' parameter names, lowercased.
 * An empty selection yields an empty set.
 */
export function parameters(forCategories: Iterable<Category>): ReadonlySet<string> {
  return unionOf(forCategories);
}

/** Names listed under a single category. */
export function categoryParameters(category: Category): ReadonlySet<string> {
  return BY_CATEGORY[category];
}

/**
 * Categories listing `name` (case-insensitive), in canonical category order.
 */
export function categoriesOf(name: string): Category[] {
  const lower = name.toLowerCase();
  return ALL_CATEGORIES.filter((category) => BY_CATEGORY[category].has(lower));
}

export function isTrackingParameter(name: string, categories?: Iterable<Category>): boolean {
  const lower = name.toLowerCase();
  if (categories === undefined) return ALL.has(lower);
  for (const category of categories) {
    if (BY_CATEGORY[category].has(lower)) return true;
  }
  return false;
}
