export type UrlLike = string | URL;

/** Which algorithm produced a result. `none` means there was no query to clean. */
export type CleanPath = "structural" | "textual" | "none";

export interface CleanOutcome {
  cleaned: string;
  /** Removed parameter names as written in the input, in input order */
  removed: string[];
  path: CleanPath;
}

export interface CleanUrlResult {
  original: string;
  cleaned: string;
  changed: boolean;
  removedParams: string[];
  path: CleanPath;
}
