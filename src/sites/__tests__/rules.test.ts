import { describe, expect, it } from "vitest";
import { buildAdapterRule, createDefaultRule, describeRule, normalizeExtensions } from "../rules";
import { siteRuleSchema } from "../schema";

describe("siteRuleSchema", () => {
  it("requires the {query} placeholder in searchUrl", () => {
    const result = siteRuleSchema.safeParse({ searchUrl: "https://example.com/search" });
    expect(result.success).toBe(false);
  });

  it("accepts a single selector string where a list is expected", () => {
    const parsed = siteRuleSchema.parse({ detail: { attachmentSelectors: ".files a" } });
    expect(parsed.detail?.attachmentSelectors).toEqual([".files a"]);
  });

  it("rejects unknown keys", () => {
    expect(siteRuleSchema.safeParse({ searchURL: "https://example.com/?q={query}" }).success).toBe(false);
  });

  it("rejects invalid date patterns", () => {
    expect(siteRuleSchema.safeParse({ detailDate: { patterns: ["(unclosed"] } }).success).toBe(false);
  });
});

describe("buildAdapterRule", () => {
  it("derives listing defaults for a dynamic rule with an item selector", () => {
    const rule = buildAdapterRule(
      "example.com",
      siteRuleSchema.parse({
        searchUrl: "https://example.com/search?q={query}",
        fetchMode: "dynamic",
        selectors: { item: "li.result", title: "a.title" },
      }),
    );

    expect(rule.fetchMode).toBe("dynamic");
    expect(rule.queryEncoding).toBe("single");
    expect(rule.listing).toEqual({
      item: "li.result",
      title: "a.title",
      date: undefined,
      waitFor: "li.result",
      waitForRequired: false,
      dateFromItem: true,
      matchKeyword: false,
      matchInTitleOnly: false,
      linkHrefContains: undefined,
    });
    expect(rule.detail.fetchMode).toBe("dynamic");
    expect(rule.detail.titleSelectors).toEqual(["h1", "title"]);
    expect(rule.detailDate.enabled).toBe(false);
  });

  it("requires an explicitly configured wait selector", () => {
    const rule = buildAdapterRule(
      "example.com",
      siteRuleSchema.parse({ fetchMode: "dynamic", selectors: { item: "div.hit", waitFor: "#results" } }),
    );
    expect(rule.listing.waitFor).toBe("#results");
    expect(rule.listing.waitForRequired).toBe(true);
  });

  it("leaves snapshots off and inherits the detail title selectors", () => {
    const rule = buildAdapterRule("example.com", siteRuleSchema.parse({ detail: { titleSelectors: "h2.title" } }));
    expect(rule.detail.snapshot).toEqual({
      enabled: false,
      markdown: true,
      titleSelectors: ["h2.title"],
      dateSelectors: [],
      bodySelectors: [],
      removeSelectors: [],
      fallbackToOriginal: true,
    });
  });

  it("keeps an explicit date selector and keyword setting", () => {
    const rule = buildAdapterRule(
      "example.com",
      siteRuleSchema.parse({ selectors: { date: "span.date" }, matchKeyword: false }),
    );
    expect(rule.listing.dateFromItem).toBe(false);
    expect(rule.listing.matchKeyword).toBe(false);
    expect(rule.listing.waitFor).toBeUndefined();
    expect(rule.listing.waitForRequired).toBe(false);
  });

  it("lowercases attachment extensions and keywords", () => {
    const rule = buildAdapterRule(
      "example.com",
      siteRuleSchema.parse({ detail: { attachmentExtensions: [".PDF", "Xlsx", " "], attachmentTextKeywords: [" Annex "] } }),
    );
    expect([...rule.detail.attachmentExtensions]).toEqual(["pdf", "xlsx"]);
    expect(rule.detail.attachmentTextKeywords).toEqual(["annex"]);
  });
});

describe("normalizeExtensions", () => {
  it("falls back to the default list when none is given", () => {
    const extensions = normalizeExtensions(undefined);
    expect(extensions.has("pdf")).toBe(true);
    expect(extensions.has("docx")).toBe(true);
    expect(extensions.has("txt")).toBe(false);
  });
});

describe("describeRule", () => {
  it("renders sets and patterns as JSON-friendly values", () => {
    const described = describeRule(createDefaultRule());
    const json = JSON.parse(JSON.stringify(described));
    expect(json.domain).toBe("*");
    expect(json.isDefault).toBe(true);
    expect(json.detail.attachmentExtensions).toContain("pdf");
    expect(typeof json.detailDate.patterns[0]).toBe("string");
  });
});
