import { ConfigError, ResolutionError } from "../core/errors";
import { SiteRuleInput } from "./schema";
import { buildAdapterRule, createDefaultRule } from "./rules";
import { AdapterRule } from "./types";

export interface SiteRegistryOptions {
  /** `null` disables the built-in fallback; unmatched hosts then raise `ResolutionError`. */
  fallback?: AdapterRule | null;
}

export function normalizeHost(value: string): string {
  const trimmed = value.trim().toLowerCase();
  if (!trimmed) {
    return "";
  }

  let host = trimmed;
  if (trimmed.includes("://")) {
    try {
      host = new URL(trimmed).hostname;
    } catch {
      host = trimmed.slice(trimmed.indexOf("://") + 3);
    }
  }

  host = host.split(/[/?#]/)[0];
  if (host.includes("@")) {
    host = host.slice(host.lastIndexOf("@") + 1);
  }
  if (!host.startsWith("[")) {
    host = host.split(":")[0];
  }
  return host.replace(/\.+$/, "");
}

export class SiteRegistry {
  private readonly rules = new Map<string, AdapterRule>();
  private readonly fallback: AdapterRule | undefined;

  constructor(rules: Iterable<AdapterRule> = [], options: SiteRegistryOptions = {}) {
    this.fallback = options.fallback === null ? undefined : (options.fallback ?? createDefaultRule());
    for (const rule of rules) {
      this.register(rule);
    }
  }

  static fromConfig(sites: Record<string, SiteRuleInput>): SiteRegistry {
    const rules: AdapterRule[] = [];
    for (const [rawDomain, input] of Object.entries(sites)) {
      const domain = normalizeHost(rawDomain);
      if (!domain) {
        throw new ConfigError(`Invalid site domain in configuration: "${rawDomain}"`);
      }
      rules.push(buildAdapterRule(domain, input));
    }
    return new SiteRegistry(rules);
  }

  register(rule: AdapterRule): void {
    this.rules.set(normalizeHost(rule.domain), rule);
  }

  domains(): string[] {
    return [...this.rules.keys()].sort();
  }

  /** Exact domain, then the longest configured suffix, then the default rule. */
  resolve(hostOrUrl: string): AdapterRule {
    const host = normalizeHost(hostOrUrl);

    const exact = this.rules.get(host);
    if (exact) {
      return exact;
    }

    let best: AdapterRule | undefined;
    let bestLength = 0;
    for (const [domain, rule] of this.rules) {
      if (host.endsWith(`.${domain}`) && domain.length > bestLength) {
        best = rule;
        bestLength = domain.length;
      }
    }
    if (best) {
      return best;
    }

    if (!this.fallback) {
      throw new ResolutionError(host);
    }
    return this.fallback;
  }
}
