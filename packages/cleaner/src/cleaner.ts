import { ALL_CATEGORIES, parameters, type Category } from "@linkscrub/params";
import { cleanUrl, cleanUrls, inspectUrl } from "./clean";
import { RemovalSet } from "./removal_set";
import type { CleanUrlResult, UrlLike } from "./types";

export type CleanerOptions =
  | {
      /** Database categories to remove (default: all of them) */
      categories?: Iterable<Category>;
      /** Additional names removed on top of the categories */
      extra?: Iterable<string>;
      only?: never;
    }
  | {
      /** Remove exactly these names, ignoring the database */
      only: Iterable<string>;
      categories?: never;
      extra?: never;
    };

export function buildRemovalSet(options: CleanerOptions = {}): RemovalSet {
  if (options.only !== undefined) {
    return RemovalSet.of(options.only);
  }
  return RemovalSet.union(parameters(options.categories ?? ALL_CATEGORIES), options.extra ?? []);
}

/**
 * Reusable cleaner with its removal set computed once.
 */
export class UrlCleaner {
  readonly removalSet: RemovalSet;

  constructor(options: CleanerOptions = {}) {
    this.removalSet = buildRemovalSet(options);
  }

  clean(url: string): string;
  clean(url: URL): URL;
  clean(url: UrlLike): UrlLike;
  clean(url: UrlLike): UrlLike {
    return cleanUrl(url, this.removalSet);
  }

  cleanAll(urls: readonly string[]): string[];
  cleanAll(urls: readonly URL[]): URL[];
  cleanAll(urls: readonly UrlLike[]): UrlLike[];
  cleanAll(urls: readonly UrlLike[]): UrlLike[] {
    return cleanUrls(urls, this.removalSet);
  }

  inspect(url: UrlLike): CleanUrlResult {
    return inspectUrl(url, this.removalSet);
  }
}

export function createCleaner(options: CleanerOptions = {}): UrlCleaner {
  return new UrlCleaner(options);
}
