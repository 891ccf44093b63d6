import { describe, expect, it } from "vitest";
import { chromiumArgs, toTextMatcher } from "../src/driver.js";

describe("toTextMatcher", () => {
  it("keeps plain text as a substring", () => {
    expect(toTextMatcher("Research Notes")).toBe("Research Notes");
  });

  it("turns a slash-delimited pattern into a regular expression", () => {
    const matcher = toTextMatcher("/^tide log$/i");

    expect(matcher).toBeInstanceOf(RegExp);
    expect(String(matcher)).toBe("/^tide log$/i");
  });

  it("falls back to the raw text for an invalid pattern", () => {
    expect(toTextMatcher("/(unclosed/")).toBe("/(unclosed/");
  });
});

describe("chromiumArgs", () => {
  it("adds the sandbox switches only on linux", () => {
    expect(chromiumArgs("darwin")).toEqual([
      "--disable-blink-features=AutomationControlled",
      "--no-first-run",
      "--no-default-browser-check"
    ]);
    expect(chromiumArgs("linux").slice(-2)).toEqual(["--no-sandbox", "--disable-setuid-sandbox"]);
  });
});
