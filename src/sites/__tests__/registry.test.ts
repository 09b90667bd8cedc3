import { describe, expect, it } from "vitest";
import { ConfigError, ResolutionError } from "../../core/errors";
import { normalizeHost, SiteRegistry } from "../registry";
import { buildAdapterRule, DEFAULT_DOMAIN } from "../rules";
import { siteRuleSchema } from "../schema";

function rule(domain: string, searchUrl: string) {
  return buildAdapterRule(domain, siteRuleSchema.parse({ searchUrl }));
}

describe("normalizeHost", () => {
  it("reduces URLs and host strings to a bare lowercase host", () => {
    expect(normalizeHost("https://User@WWW.Example.com:8443/path?q=1")).toBe("www.example.com");
    expect(normalizeHost(" Example.COM. ")).toBe("example.com");
    expect(normalizeHost("example.com/search")).toBe("example.com");
    expect(normalizeHost("")).toBe("");
  });
});

describe("SiteRegistry.resolve", () => {
  const registry = new SiteRegistry([
    rule("example.com", "https://example.com/search?q={query}"),
    rule("news.example.com", "https://news.example.com/find?kw={query}"),
  ]);

  it("prefers an exact domain match", () => {
    expect(registry.resolve("https://example.com/anything").domain).toBe("example.com");
    expect(registry.resolve("NEWS.example.com").domain).toBe("news.example.com");
  });

  it("falls back to the longest matching parent domain", () => {
    expect(registry.resolve("a.news.example.com").domain).toBe("news.example.com");
    expect(registry.resolve("www.example.com").domain).toBe("example.com");
  });

  it("returns the default rule for unknown hosts", () => {
    const resolved = registry.resolve("other.org");
    expect(resolved.isDefault).toBe(true);
    expect(resolved.domain).toBe(DEFAULT_DOMAIN);
    expect(resolved.searchUrlTemplate).toBeUndefined();
  });

  it("does not treat a bare suffix as a parent domain", () => {
    expect(registry.resolve("notexample.com").isDefault).toBe(true);
  });

  it("throws ResolutionError only when the fallback is disabled", () => {
    const strict = new SiteRegistry([], { fallback: null });
    expect(() => strict.resolve("example.com")).toThrow(ResolutionError);
  });
});

describe("SiteRegistry.fromConfig", () => {
  it("normalizes configured domains", () => {
    const registry = SiteRegistry.fromConfig({
      "HTTPS://Portal.Example.org/": siteRuleSchema.parse({ searchUrl: "https://portal.example.org/s?q={query}" }),
    });
    expect(registry.domains()).toEqual(["portal.example.org"]);
    expect(registry.resolve("portal.example.org").searchUrlTemplate).toBe("https://portal.example.org/s?q={query}");
  });

  it("rejects an empty domain key", () => {
    expect(() => SiteRegistry.fromConfig({ " ": siteRuleSchema.parse({}) })).toThrow(ConfigError);
  });
});
