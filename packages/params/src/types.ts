/**
 * Tracking parameter categories, used to remove one kind of tracking while
 * keeping others.
 *
 * - analytics: Google Analytics/Ads, search engines, Matomo/Piwik
 * - social: Facebook, X, TikTok, Instagram, LinkedIn, Reddit and friends
 * - email: Mailchimp, HubSpot, Salesforce Marketing Cloud, SMS campaigns
 * - ecommerce: affiliate networks, Amazon, eBay, Etsy
 * - other: news sites, video platforms, generic tracker ids
 */
export type Category = "analytics" | "social" | "email" | "ecommerce" | "other";

export const ALL_CATEGORIES: readonly Category[] = ["analytics", "social", "email", "ecommerce", "other"];

export function isCategory(value: string): value is Category {
  return ALL_CATEGORIES.some((category) => category === value);
}
