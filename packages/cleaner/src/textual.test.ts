import { describe, expect, it } from "vitest";
import { RemovalSet } from "./removal_set";
import { cleanTextual } from "./textual";

const removal = RemovalSet.of(["utm_source", "fbclid"]);

describe("cleanTextual", () => {
  it("returns text without a question mark unchanged", () => {
    expect(cleanTextual("just-a-path", removal)).toEqual({ cleaned: "just-a-path", removed: [], path: "none" });
  });

  it("splits at the first question mark only", () => {
    expect(cleanTextual("a?utm_source=x?y&b=1?2", removal)).toEqual({
      cleaned: "a?b=1?2",
      removed: ["utm_source"],
      path: "textual",
    });
  });

  it("removes bare flags and keeps empty tokens", () => {
    expect(cleanTextual("p?FBCLID&&id=1", removal)).toEqual({
      cleaned: "p?&id=1",
      removed: ["FBCLID"],
      path: "textual",
    });
  });

  it("leaves an empty query marker in place", () => {
    expect(cleanTextual("p?", removal).cleaned).toBe("p?");
  });
});
