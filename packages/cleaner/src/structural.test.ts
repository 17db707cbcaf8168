import { describe, expect, it } from "vitest";
import { RemovalSet } from "./removal_set";
import { cleanStructural, joinUrlText, parseUrl, reparseUrl, splitUrlText } from "./structural";

describe("splitUrlText", () => {
  it("splits base, query and fragment", () => {
    expect(splitUrlText("https://example.com/a?x=1&y=2#frag")).toEqual({
      base: "https://example.com/a",
      query: "x=1&y=2",
      fragment: "frag",
    });
  });

  it("reports a missing query as null and an empty one as empty", () => {
    expect(splitUrlText("https://example.com/a").query).toBeNull();
    expect(splitUrlText("https://example.com/a?").query).toBe("");
  });

  it("assigns a question mark after the hash to the fragment", () => {
    expect(splitUrlText("https://example.com/#/p?x=1")).toEqual({
      base: "https://example.com/",
      query: null,
      fragment: "/p?x=1",
    });
  });
});

describe("joinUrlText", () => {
  it("omits an empty query but keeps an empty fragment", () => {
    expect(joinUrlText({ base: "https://example.com", query: "", fragment: "" })).toBe("https://example.com#");
    expect(joinUrlText({ base: "https://example.com", query: "a=1", fragment: null })).toBe("https://example.com?a=1");
  });
});

describe("parseUrl", () => {
  it("returns null instead of throwing", () => {
    expect(parseUrl("not a url")).toBeNull();
    expect(parseUrl("https://example.com")?.hostname).toBe("example.com");
  });
});

describe("reparseUrl", () => {
  it("parses the cleaned text into a new URL", () => {
    const fallback = new URL("https://example.com/?gclid=1");
    expect(reparseUrl("https://example.com/", fallback).href).toBe("https://example.com/");
  });

  it("copies the fallback when the text no longer parses", () => {
    const fallback = new URL("https://example.com/?id=1");
    const result = reparseUrl("not a url", fallback);
    expect(result).not.toBe(fallback);
    expect(result.href).toBe("https://example.com/?id=1");
  });
});

describe("cleanStructural", () => {
  it("keeps the input when the cleaned text no longer parses", () => {
    expect(cleanStructural("not a url?utm_source=1", RemovalSet.of(["utm_source"]))).toEqual({
      cleaned: "not a url?utm_source=1",
      removed: [],
      path: "structural",
    });
  });

  it("reports none when there is no query", () => {
    expect(cleanStructural("https://example.com/a#b", RemovalSet.of(["a"]))).toEqual({
      cleaned: "https://example.com/a#b",
      removed: [],
      path: "none",
    });
  });

  it("removes matching items and keeps the rest verbatim", () => {
    expect(cleanStructural("https://example.com/?A=1&b=%20&c", RemovalSet.of(["a", "c"]))).toEqual({
      cleaned: "https://example.com/?b=%20",
      removed: ["A", "c"],
      path: "structural",
    });
  });
});
