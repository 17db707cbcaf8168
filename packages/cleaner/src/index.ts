export * from "./clean";
export * from "./cleaner";
export * from "./removal_set";
export type { CleanOutcome, CleanPath, CleanUrlResult, UrlLike } from "./types";
export { ALL_CATEGORIES, type Category } from "@linkscrub/params";
