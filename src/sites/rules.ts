import { AdapterRule, DetailDateRule, DetailRule, SnapshotRule } from "./types";
import { SiteRuleInput } from "./schema";

export const DEFAULT_DOMAIN = "*";

export const DEFAULT_ATTACHMENT_EXTENSIONS = [
  "pdf",
  "doc",
  "docx",
  "xls",
  "xlsx",
  "zip",
  "rar",
  "7z",
  "csv",
  "ppt",
  "pptx",
] as const;

export const DEFAULT_TITLE_SELECTORS = ["h1", "title"] as const;

export const DEFAULT_ATTACHMENT_SELECTORS = ["a[href]"] as const;

const DATE_VALUE = "(\\d{4}[./-]\\d{1,2}[./-]\\d{1,2}(?:\\s+\\d{1,2}:\\d{2}(?::\\d{2})?)?|\\d{4}年\\d{1,2}月\\d{1,2}日)";

export const DEFAULT_DETAIL_DATE_PATTERNS = [
  `(?:发布日期|发布时间|日期|Published(?: on)?|Publication date|Date)[：:\\s]*${DATE_VALUE}`,
] as const;

export function normalizeExtensions(values: readonly string[] | undefined): Set<string> {
  const items = values && values.length > 0 ? values : DEFAULT_ATTACHMENT_EXTENSIONS;
  const normalized = new Set<string>();
  for (const item of items) {
    const text = item.trim().toLowerCase().replace(/^\.+/, "");
    if (text) {
      normalized.add(text);
    }
  }
  return normalized;
}

function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, "i"));
}

function nonEmpty<T>(values: readonly T[] | undefined, fallback: readonly T[]): readonly T[] {
  return values && values.length > 0 ? values : fallback;
}

type DetailInput = NonNullable<SiteRuleInput["detail"]>;

function buildSnapshotRule(input: DetailInput["snapshot"], titleSelectors: readonly string[]): SnapshotRule {
  return {
    enabled: input?.enabled ?? false,
    markdown: input?.markdown ?? true,
    titleSelectors: nonEmpty(input?.titleSelectors, titleSelectors),
    dateSelectors: input?.dateSelectors ?? [],
    bodySelectors: input?.bodySelectors ?? [],
    removeSelectors: input?.removeSelectors ?? [],
    fallbackToOriginal: input?.fallbackToOriginal ?? true,
  };
}

function buildDetailRule(input: SiteRuleInput["detail"], fallbackMode: AdapterRule["fetchMode"]): DetailRule {
  const titleSelectors = nonEmpty(input?.titleSelectors, DEFAULT_TITLE_SELECTORS);
  return {
    enabled: input?.enabled ?? true,
    fetchMode: input?.fetchMode ?? fallbackMode,
    titleSelectors,
    attachmentSelectors: nonEmpty(input?.attachmentSelectors, DEFAULT_ATTACHMENT_SELECTORS),
    attachmentExtensions: normalizeExtensions(input?.attachmentExtensions),
    attachmentTextKeywords: (input?.attachmentTextKeywords ?? [])
      .map((keyword) => keyword.trim().toLowerCase())
      .filter(Boolean),
    snapshot: buildSnapshotRule(input?.snapshot, titleSelectors),
  };
}

function buildDetailDateRule(input: SiteRuleInput["detailDate"]): DetailDateRule {
  return {
    enabled: input?.enabled ?? false,
    fetchMode: input?.fetchMode ?? "static",
    selectors: input?.selectors ?? [],
    patterns: compilePatterns(nonEmpty(input?.patterns, DEFAULT_DETAIL_DATE_PATTERNS)),
  };
}

/**
 * The rule used for hosts without an override: the job URL is fetched as-is,
 * every anchor whose surrounding text mentions the query becomes a candidate,
 * and the date is read from that surrounding text.
 */
export function createDefaultRule(): AdapterRule {
  return {
    domain: DEFAULT_DOMAIN,
    isDefault: true,
    queryEncoding: "single",
    fetchMode: "static",
    listing: {
      item: "a[href]",
      title: "a",
      dateFromItem: true,
      matchKeyword: true,
      matchInTitleOnly: false,
      waitForRequired: false,
    },
    detail: buildDetailRule(undefined, "static"),
    detailDate: buildDetailDateRule(undefined),
  };
}

export function buildAdapterRule(domain: string, input: SiteRuleInput): AdapterRule {
  const fetchMode = input.fetchMode ?? "static";
  const selectors = input.selectors ?? {};
  const item = selectors.item ?? "a[href]";

  return {
    domain,
    isDefault: false,
    searchUrlTemplate: input.searchUrl,
    queryEncoding: input.queryEncoding ?? "single",
    fetchMode,
    listing: {
      item,
      title: selectors.title ?? "a",
      date: selectors.date,
      waitFor: selectors.waitFor ?? (fetchMode === "dynamic" ? item : undefined),
      waitForRequired: selectors.waitFor !== undefined,
      dateFromItem: input.dateFromItem ?? selectors.date === undefined,
      // with an explicit item selector the site's own search decides relevance
      matchKeyword: input.matchKeyword ?? selectors.item === undefined,
      matchInTitleOnly: input.matchInTitleOnly ?? false,
      linkHrefContains: input.linkHrefContains,
    },
    detail: buildDetailRule(input.detail, fetchMode),
    detailDate: buildDetailDateRule(input.detailDate),
  };
}

/** JSON-friendly view of a rule, for the `resolve` command and logs. */
export function describeRule(rule: AdapterRule): Record<string, unknown> {
  return {
    ...rule,
    detail: {
      ...rule.detail,
      attachmentExtensions: [...rule.detail.attachmentExtensions].sort(),
    },
    detailDate: {
      ...rule.detailDate,
      patterns: rule.detailDate.patterns.map((pattern) => pattern.source),
    },
  };
}
