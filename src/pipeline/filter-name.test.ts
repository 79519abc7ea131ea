/**
 * filter-name.test.ts - Unit tests for artifact name derivation
 *
 * Expected names are worked out by applying the replacement list in order,
 * then the catch-all "_" substitution, collapse and trim.
 */

import { describe, it, expect } from "vitest";
import {
  sanitizeFilterName,
  defaultFallbackName,
  MATCH_ALL_NAME,
} from "./filter-name";

describe("sanitizeFilterName", () => {
  it("maps the match-all pattern to all_instances", () => {
    expect(sanitizeFilterName(".*")).toBe("all_instances");
  });

  it("replaces .* with wildcard", () => {
    expect(sanitizeFilterName("web.*")).toBe("webwildcard");
    expect(sanitizeFilterName("db.*")).toBe("dbwildcard");
    expect(sanitizeFilterName(".*db.*")).toBe("wildcarddbwildcard");
  });

  it("replaces anchors", () => {
    expect(sanitizeFilterName("^prod-.*")).toBe("start_prod-wildcard");
    expect(sanitizeFilterName("^$")).toBe("start_end");
  });

  it("replaces groups and alternation", () => {
    expect(sanitizeFilterName("(web|db)")).toBe("paren_webordbparen");
  });

  it("replaces brackets and quantifiers in order", () => {
    expect(sanitizeFilterName("[0-9]+$")).toBe("bracket_0-9bracketplusend");
    expect(sanitizeFilterName("a{2}")).toBe("abrace_2brace");
    expect(sanitizeFilterName("web?")).toBe("webquestion");
  });

  it("replaces backslashes", () => {
    expect(sanitizeFilterName("\\d")).toBe("backslashd");
  });

  it("handles .* before a following ? (order matters)", () => {
    expect(sanitizeFilterName("x.*?")).toBe("xwildcardquestion");
  });

  it("turns other characters into a single underscore", () => {
    expect(sanitizeFilterName("web 01")).toBe("web_01");
    expect(sanitizeFilterName("a..b")).toBe("a_b");
  });

  it("trims leading and trailing underscores", () => {
    expect(sanitizeFilterName(".web.")).toBe("web");
  });

  it("keeps letters, digits, hyphens and underscores as they are", () => {
    expect(sanitizeFilterName("prod-app_01")).toBe("prod-app_01");
  });

  it("uses the fallback when nothing filename-safe is left", () => {
    expect(sanitizeFilterName(".", { fallbackName: () => "fallback" })).toBe(
      "fallback"
    );
    expect(sanitizeFilterName("**", { fallbackName: () => "fallback" })).toBe(
      "fallback"
    );
  });

  it("default fallback produces distinct filter_ names", () => {
    const first = sanitizeFilterName(".");
    const second = sanitizeFilterName(".");

    expect(first).toMatch(/^filter_\d+_\d+$/);
    expect(second).toMatch(/^filter_\d+_\d+$/);
    expect(first).not.toBe(second);
  });

  it("never gives another pattern the reserved match-all name", () => {
    expect(sanitizeFilterName("all_instances")).toBe("all_instances_filter");
    expect(sanitizeFilterName("all.instances")).toBe("all_instances_filter");
    expect(sanitizeFilterName(".*.*")).not.toBe(MATCH_ALL_NAME);
  });

  it("is deterministic", () => {
    expect(sanitizeFilterName("^web-[a-z]+")).toBe(
      sanitizeFilterName("^web-[a-z]+")
    );
  });
});

describe("defaultFallbackName", () => {
  it("increments its sequence on every call", () => {
    const a = defaultFallbackName();
    const b = defaultFallbackName();

    const seqA = Number(a.split("_")[2]);
    const seqB = Number(b.split("_")[2]);
    expect(seqB).toBe(seqA + 1);
  });
});
